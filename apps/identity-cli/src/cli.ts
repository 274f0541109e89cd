#!/usr/bin/env -S node --import tsx
import { makeErrorResponse } from "@idcore/shared";
import { claimId, keyId } from "./commands/ids.js";
import { profileDemo } from "./commands/profileDemo.js";
import { topicDecode, topicEncode } from "./commands/topic.js";
import "./config.js";

const [command, ...args] = process.argv.slice(2);

const run = async () => {
  if (command === "topic:encode") {
    console.log(topicEncode(args[0]));
    return;
  }
  if (command === "topic:decode") {
    console.log(topicDecode(args[0]));
    return;
  }
  if (command === "claim:id") {
    console.log(claimId(args[0], args[1]));
    return;
  }
  if (command === "key:id") {
    console.log(keyId(args[0]));
    return;
  }
  if (command === "profile:demo") {
    console.log(profileDemo());
    return;
  }
  console.log("idcore commands:");
  console.log("  topic:encode <label>            Encode an attribute label as a topic");
  console.log("  topic:decode <topic>            Decode a topic back to its label");
  console.log("  claim:id <issuer> <label|topic> Compute a claim id");
  console.log("  key:id <address>                Compute the key id of an address");
  console.log("  profile:demo                    Attach a profile in memory and print it");
};

run()
  .then(() => {
    process.exit(0);
  })
  .catch((error) => {
    console.error(JSON.stringify(makeErrorResponse(error)));
    process.exit(1);
  });
