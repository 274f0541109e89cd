export type Address = string & {};

export type KeyId = string & {};

export type ClaimId = string & {};

export const KeyPurpose = {
  MANAGEMENT: 1,
  ACTION: 2,
  CLAIM: 3,
  ENCRYPT: 4
} as const;

// Codes above ENCRYPT are identity-specific extension purposes.
export type KeyPurposeCode = number;

export const KeyType = {
  ECDSA: 1,
  RSA: 2
} as const;

export type KeyTypeCode = number;

export type Key = {
  key: KeyId;
  purposes: KeyPurposeCode[];
  keyType: KeyTypeCode;
};

export type Claim = {
  topic: bigint;
  scheme: number;
  issuer: Address;
  signature: Uint8Array;
  data: Uint8Array;
  uri: string;
};

export type ExecutionStatus = "pending" | "executed";

export type ExecutionRequest = {
  id: number;
  target: Address;
  value: bigint;
  payload: Uint8Array;
  requiredPurpose: KeyPurposeCode;
  approvals: KeyId[];
  status: ExecutionStatus;
  // Set once the request is executed.
  succeeded?: boolean;
};

export type ExternalCall = {
  from: Address;
  target: Address;
  value: bigint;
  payload: Uint8Array;
};

// Host-provided call primitive: true on success, false (or a throw) when
// the call failed and was rolled back by the host.
export type CallDispatcher = (call: ExternalCall) => boolean;

export type IdentityEvent =
  | { type: "key_added"; key: KeyId; purpose: KeyPurposeCode; keyType: KeyTypeCode }
  | { type: "key_removed"; key: KeyId; purpose: KeyPurposeCode; keyType: KeyTypeCode }
  | {
      type: "execution_requested";
      executionId: number;
      target: Address;
      value: bigint;
      payload: Uint8Array;
    }
  | { type: "execution_approved"; executionId: number; approver: KeyId; approved: boolean }
  | { type: "executed"; executionId: number; target: Address; value: bigint; payload: Uint8Array }
  | {
      type: "execution_failed";
      executionId: number;
      target: Address;
      value: bigint;
      payload: Uint8Array;
    }
  | {
      type: "claim_added";
      claimId: ClaimId;
      topic: bigint;
      scheme: number;
      issuer: Address;
      replaced: boolean;
    }
  | { type: "claim_removed"; claimId: ClaimId; topic: bigint; scheme: number; issuer: Address };

export type IdentityEventListener = (event: IdentityEvent) => void;

export type Emit = (event: IdentityEvent) => void;
