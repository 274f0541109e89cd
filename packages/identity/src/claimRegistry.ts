import {
  ZERO_ADDRESS,
  concatBytes,
  fail,
  hexToBytes,
  keccak256Hex,
  uintToBytes
} from "@idcore/shared";
import type { KeyRegistry } from "./keyRegistry.js";
import { KeyPurpose } from "./types.js";
import type { Address, Claim, ClaimId, Emit } from "./types.js";

export type ClaimInput = {
  topic: bigint;
  scheme: number;
  issuer: Address;
  signature: Uint8Array;
  data: Uint8Array;
  uri?: string;
};

const topicKey = (topic: bigint) => topic.toString();

// keccak256(issuer ‖ uint256 topic), tightly packed.
export const computeClaimId = (issuer: Address, topic: bigint): ClaimId =>
  keccak256Hex(concatBytes(hexToBytes(issuer), uintToBytes(topic, 32)));

export const emptyClaim = (): Claim => ({
  topic: 0n,
  scheme: 0,
  issuer: ZERO_ADDRESS,
  signature: new Uint8Array(0),
  data: new Uint8Array(0),
  uri: ""
});

const copyClaim = (claim: Claim): Claim => ({
  ...claim,
  signature: claim.signature.slice(),
  data: claim.data.slice()
});

export class ClaimRegistry {
  private readonly keys: KeyRegistry;
  private readonly emit: Emit;
  private readonly claims = new Map<ClaimId, Claim>();
  private readonly byTopic = new Map<string, ClaimId[]>();
  // Position of each claim id inside its topic list, for O(1) removal.
  private readonly positions = new Map<ClaimId, number>();

  constructor(input: { keys: KeyRegistry; emit: Emit }) {
    this.keys = input.keys;
    this.emit = input.emit;
  }

  canAssert(caller: Address, issuer: Address) {
    return caller === issuer || this.keys.callerHasAny(caller, [KeyPurpose.CLAIM]);
  }

  assertCanAssert(caller: Address, issuer: Address) {
    if (!this.canAssert(caller, issuer)) {
      fail("unauthorized", "add_claim_requires_issuer_or_claim_key", `caller ${caller}`);
    }
  }

  addClaim(caller: Address, input: ClaimInput) {
    this.assertCanAssert(caller, input.issuer);
    return this.write(input);
  }

  // Callers authorize every element first; this only applies the writes.
  writeAll(inputs: ClaimInput[]) {
    return inputs.map((input) => this.write(input));
  }

  removeClaim(caller: Address, claimId: ClaimId) {
    const claim = this.claims.get(claimId);
    if (!claim) {
      return fail("not_found", "claim_not_found", claimId);
    }
    if (!this.canAssert(caller, claim.issuer)) {
      fail("unauthorized", "remove_claim_requires_issuer_or_claim_key", `caller ${caller}`);
    }
    this.claims.delete(claimId);
    this.unindex(claimId, claim.topic);
    this.emit({
      type: "claim_removed",
      claimId,
      topic: claim.topic,
      scheme: claim.scheme,
      issuer: claim.issuer
    });
    return true;
  }

  getClaim(claimId: ClaimId) {
    const claim = this.claims.get(claimId);
    return claim ? copyClaim(claim) : emptyClaim();
  }

  getClaimIdsByTopic(topic: bigint) {
    return [...(this.byTopic.get(topicKey(topic)) ?? [])];
  }

  private write(input: ClaimInput) {
    const claimId = computeClaimId(input.issuer, input.topic);
    const replaced = this.claims.has(claimId);
    this.claims.set(claimId, {
      topic: input.topic,
      scheme: input.scheme,
      issuer: input.issuer,
      signature: input.signature.slice(),
      data: input.data.slice(),
      uri: input.uri ?? ""
    });
    if (!replaced) {
      const ids = this.byTopic.get(topicKey(input.topic)) ?? [];
      this.positions.set(claimId, ids.length);
      ids.push(claimId);
      this.byTopic.set(topicKey(input.topic), ids);
    }
    this.emit({
      type: "claim_added",
      claimId,
      topic: input.topic,
      scheme: input.scheme,
      issuer: input.issuer,
      replaced
    });
    return claimId;
  }

  // Swap-with-last: the topic list does not keep its order after a removal.
  private unindex(claimId: ClaimId, topic: bigint) {
    const key = topicKey(topic);
    const ids = this.byTopic.get(key);
    const position = this.positions.get(claimId);
    this.positions.delete(claimId);
    if (!ids || position === undefined) {
      return;
    }
    const last = ids.pop();
    if (last !== undefined && last !== claimId) {
      ids[position] = last;
      this.positions.set(last, position);
    }
    if (!ids.length) {
      this.byTopic.delete(key);
    }
  }
}
