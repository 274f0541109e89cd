import { extractRange, fail } from "@idcore/shared";
import type { ClaimInput } from "./claimRegistry.js";
import type { Address } from "./types.js";

export type ClaimBatch = {
  topics: bigint[];
  issuers: Address[];
  // Fixed-width signatures back to back, or empty for "no signatures".
  signatures: Uint8Array;
  // Variable-length values back to back; dataLengths[i] bytes each.
  data: Uint8Array;
  dataLengths: number[];
};

export const BATCH_CLAIM_SCHEME = 1;

export const decodeClaimBatch = (
  batch: ClaimBatch,
  options: { signatureBytes: number; maxClaims: number }
): ClaimInput[] => {
  const count = batch.topics.length;
  if (batch.issuers.length !== count || batch.dataLengths.length !== count) {
    fail(
      "length_mismatch",
      "claim_batch_length_mismatch",
      `topics=${count} issuers=${batch.issuers.length} dataLengths=${batch.dataLengths.length}`
    );
  }
  const width = options.signatureBytes;
  if (batch.signatures.length > 0 && batch.signatures.length !== count * width) {
    fail(
      "length_mismatch",
      "claim_batch_signature_length_mismatch",
      `expected ${count * width} bytes, got ${batch.signatures.length}`
    );
  }
  if (count > options.maxClaims) {
    fail("capacity_exceeded", "claim_batch_too_large", `limit=${options.maxClaims}`);
  }

  const claims: ClaimInput[] = [];
  let offset = 0;
  for (let index = 0; index < count; index += 1) {
    const length = batch.dataLengths[index];
    const signature =
      batch.signatures.length > 0
        ? extractRange(batch.signatures, index * width, width)
        : new Uint8Array(0);
    const data = extractRange(batch.data, offset, length);
    offset += length;
    claims.push({
      topic: batch.topics[index],
      scheme: BATCH_CLAIM_SCHEME,
      issuer: batch.issuers[index],
      signature,
      data,
      uri: ""
    });
  }
  return claims;
};
