import { z } from "zod";
import { bytesToUtf8, canonicalizeJson, fail, hexToBytes, utf8ToBytes } from "@idcore/shared";
import { AddressSchema, ClaimIdSchema, KeyIdSchema, KeyTypeSchema, PurposeSchema, SchemeSchema } from "./schemas.js";
import type { Address, ClaimId, KeyId, KeyPurposeCode, KeyTypeCode } from "./types.js";

/**
 * Operations an identity can run on itself through an approved execution
 * whose target is its own address.
 */
export type IdentityCall =
  | { method: "addKey"; key: KeyId; purpose: KeyPurposeCode; keyType: KeyTypeCode }
  | { method: "removeKey"; key: KeyId; purpose: KeyPurposeCode }
  | {
      method: "addClaim";
      topic: bigint;
      scheme: number;
      issuer: Address;
      signature: Uint8Array;
      data: Uint8Array;
      uri?: string;
    }
  | { method: "removeClaim"; claimId: ClaimId };

const HexBytesSchema = z
  .string()
  .regex(/^0x([0-9a-fA-F]{2})*$/, "hex_invalid")
  .transform((value) => hexToBytes(value));

const DecimalTopicSchema = z
  .string()
  .regex(/^\d{1,78}$/, "topic_invalid")
  .transform((value) => BigInt(value));

const IdentityCallSchema = z.discriminatedUnion("method", [
  z.object({
    method: z.literal("addKey"),
    key: KeyIdSchema,
    purpose: PurposeSchema,
    keyType: KeyTypeSchema
  }),
  z.object({
    method: z.literal("removeKey"),
    key: KeyIdSchema,
    purpose: PurposeSchema
  }),
  z.object({
    method: z.literal("addClaim"),
    topic: DecimalTopicSchema,
    scheme: SchemeSchema,
    issuer: AddressSchema,
    signature: HexBytesSchema,
    data: HexBytesSchema,
    uri: z.string().optional()
  }),
  z.object({
    method: z.literal("removeClaim"),
    claimId: ClaimIdSchema
  })
]);

export const encodeIdentityCall = (call: IdentityCall) => utf8ToBytes(canonicalizeJson(call));

export const decodeIdentityCall = (payload: Uint8Array): IdentityCall => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bytesToUtf8(payload));
  } catch (error) {
    return fail(
      "invalid_request",
      "identity_call_malformed",
      error instanceof Error ? error.message : String(error)
    );
  }
  const result = IdentityCallSchema.safeParse(parsed);
  if (!result.success) {
    return fail("invalid_request", "identity_call_invalid", result.error.issues[0]?.message);
  }
  return result.data;
};
