import { labelToTopic, topicToLabel } from "@idcore/topic-codec";
import { fail } from "@idcore/shared";
import { requireArg } from "./args.js";

export const topicEncode = (label: string | undefined) =>
  labelToTopic(requireArg(label, "label")).toString();

export const topicDecode = (topic: string | undefined) => {
  const raw = requireArg(topic, "topic");
  if (!/^\d+$/.test(raw)) {
    return fail("invalid_request", "topic_invalid", raw);
  }
  return topicToLabel(BigInt(raw));
};
