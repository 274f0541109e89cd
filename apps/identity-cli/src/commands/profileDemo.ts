import { bytesToUtf8, concatBytes, createLogger, utf8ToBytes } from "@idcore/shared";
import { KeyPurpose, KeyType, computeClaimId, createIdentity, keyIdForAddress } from "@idcore/identity";
import { labelToTopic } from "@idcore/topic-codec";

export const DEMO_IDENTITY = "0x00000000000000000000000000000000000000d1";
export const DEMO_OWNER = "0x00000000000000000000000000000000000000d2";
export const DEMO_ISSUER = "0x00000000000000000000000000000000000000d3";

const PROFILE: Array<[label: string, value: string]> = [
  ["givenName", "Alice"],
  ["familyName", "Example"],
  ["email", "alice@example.test"],
  ["jobTitle", "Engineer"],
  ["url", "https://alice.example.test"],
  ["description", "Placeholder profile"]
];

/**
 * Builds a throwaway identity, lets a claim-purpose issuer attach a profile
 * in one batch, and reads every field back the way a relying party would.
 */
export const profileDemo = () => {
  const identity = createIdentity({
    address: DEMO_IDENTITY,
    owner: DEMO_OWNER,
    logger: createLogger({ service: "identity-cli", level: "silent" })
  });
  identity.addKey(DEMO_OWNER, {
    key: keyIdForAddress(DEMO_ISSUER),
    purpose: KeyPurpose.CLAIM,
    keyType: KeyType.ECDSA
  });

  const entries = PROFILE.map(([label, value]) => ({
    label,
    topic: labelToTopic(label),
    data: utf8ToBytes(value)
  }));
  identity.addClaims(DEMO_ISSUER, {
    topics: entries.map((entry) => entry.topic),
    issuers: entries.map(() => DEMO_ISSUER),
    signatures: new Uint8Array(0),
    data: concatBytes(...entries.map((entry) => entry.data)),
    dataLengths: entries.map((entry) => entry.data.length)
  });

  const claims = entries.map(({ label, topic }) => {
    const claimId = computeClaimId(DEMO_ISSUER, topic);
    const claim = identity.getClaim(claimId);
    return {
      label,
      topic: topic.toString(),
      claimId,
      issuer: claim.issuer,
      value: bytesToUtf8(claim.data)
    };
  });
  return JSON.stringify(claims, null, 2);
};
