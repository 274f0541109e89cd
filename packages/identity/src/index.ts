export { Identity, createIdentity } from "./identity.js";
export type {
  AddClaimInput,
  AddKeyInput,
  ApproveInput,
  CreateIdentityOptions,
  ExecuteInput,
  RemoveKeyInput
} from "./identity.js";
export { loadConfig } from "./config.js";
export type { IdentityConfig } from "./config.js";
export { BATCH_CLAIM_SCHEME } from "./claimBatch.js";
export type { ClaimBatch } from "./claimBatch.js";
export { computeClaimId } from "./claimRegistry.js";
export { keyIdForAddress } from "./keyRegistry.js";
export { decodeIdentityCall, encodeIdentityCall } from "./selfCall.js";
export type { IdentityCall } from "./selfCall.js";
export { KeyPurpose, KeyType } from "./types.js";
export type {
  Address,
  CallDispatcher,
  Claim,
  ClaimId,
  ExecutionRequest,
  ExecutionStatus,
  ExternalCall,
  IdentityEvent,
  IdentityEventListener,
  Key,
  KeyId,
  KeyPurposeCode,
  KeyTypeCode
} from "./types.js";
