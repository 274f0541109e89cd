import { fail, hexToBytes, keccak256Hex } from "@idcore/shared";
import { KeyPurpose } from "./types.js";
import type { Address, Emit, Key, KeyId, KeyPurposeCode, KeyTypeCode } from "./types.js";

type KeyEntry = {
  purposes: Set<KeyPurposeCode>;
  keyType: KeyTypeCode;
};

export const keyIdForAddress = (address: Address): KeyId => keccak256Hex(hexToBytes(address));

/**
 * Multi-purpose key store. Inputs are expected to be normalized already
 * (lowercase hex); the facade validates them.
 *
 * The identity's own address is authorized for every purpose, which is how
 * threshold-approved self-calls reach the mutating operations.
 */
export class KeyRegistry {
  readonly self: Address;
  private readonly emit: Emit;
  private readonly keys = new Map<KeyId, KeyEntry>();
  // Per purpose, key ids in the order the purpose was granted.
  private readonly byPurpose = new Map<KeyPurposeCode, KeyId[]>();

  constructor(input: { self: Address; emit: Emit }) {
    this.self = input.self;
    this.emit = input.emit;
  }

  callerHasAny(caller: Address, purposes: KeyPurposeCode[]) {
    if (caller === this.self) return true;
    const key = keyIdForAddress(caller);
    return purposes.some((purpose) => this.keyHasPurpose(key, purpose));
  }

  assertCallerHasAny(caller: Address, purposes: KeyPurposeCode[], operation: string) {
    if (!this.callerHasAny(caller, purposes)) {
      fail("unauthorized", `${operation}_requires_purpose`, `caller ${caller} lacks ${purposes.join("|")}`);
    }
  }

  addKey(caller: Address, input: { key: KeyId; purpose: KeyPurposeCode; keyType: KeyTypeCode }) {
    this.assertCallerHasAny(caller, [KeyPurpose.MANAGEMENT], "add_key");
    this.grant(input.key, input.purpose, input.keyType);
    return true;
  }

  removeKey(caller: Address, input: { key: KeyId; purpose: KeyPurposeCode }) {
    this.assertCallerHasAny(caller, [KeyPurpose.MANAGEMENT], "remove_key");
    const entry = this.keys.get(input.key);
    if (!entry || !entry.purposes.has(input.purpose)) {
      return true;
    }
    entry.purposes.delete(input.purpose);
    const holders = this.byPurpose.get(input.purpose) ?? [];
    const remaining = holders.filter((key) => key !== input.key);
    if (remaining.length) {
      this.byPurpose.set(input.purpose, remaining);
    } else {
      this.byPurpose.delete(input.purpose);
    }
    if (entry.purposes.size === 0) {
      this.keys.delete(input.key);
    }
    this.emit({ type: "key_removed", key: input.key, purpose: input.purpose, keyType: entry.keyType });
    return true;
  }

  // Used once at creation for the owner key; skips the caller check.
  grant(key: KeyId, purpose: KeyPurposeCode, keyType: KeyTypeCode) {
    const entry = this.keys.get(key);
    if (entry?.purposes.has(purpose)) {
      return;
    }
    if (entry) {
      entry.purposes.add(purpose);
    } else {
      this.keys.set(key, { purposes: new Set([purpose]), keyType });
    }
    const holders = this.byPurpose.get(purpose) ?? [];
    holders.push(key);
    this.byPurpose.set(purpose, holders);
    this.emit({ type: "key_added", key, purpose, keyType: entry?.keyType ?? keyType });
  }

  getKey(key: KeyId): Key {
    const entry = this.keys.get(key);
    if (!entry) {
      return { key, purposes: [], keyType: 0 };
    }
    return { key, purposes: [...entry.purposes], keyType: entry.keyType };
  }

  getKeyPurposes(key: KeyId) {
    return [...(this.keys.get(key)?.purposes ?? [])];
  }

  getKeysByPurpose(purpose: KeyPurposeCode) {
    return [...(this.byPurpose.get(purpose) ?? [])];
  }

  keyHasPurpose(key: KeyId, purpose: KeyPurposeCode) {
    return this.keys.get(key)?.purposes.has(purpose) ?? false;
  }
}
