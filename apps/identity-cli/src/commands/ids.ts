import { computeClaimId, keyIdForAddress } from "@idcore/identity";
import { parseTopicArg, requireAddress } from "./args.js";

export const claimId = (issuer: string | undefined, topic: string | undefined) =>
  computeClaimId(requireAddress(issuer), parseTopicArg(topic));

export const keyId = (address: string | undefined) => keyIdForAddress(requireAddress(address));
