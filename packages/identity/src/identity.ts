import { z } from "zod";
import {
  createLogger,
  createMetricsRegistry,
  extractRange,
  isIdentityError
} from "@idcore/shared";
import type { Logger, MetricsRegistry } from "@idcore/shared";
import { ApprovalExecutor } from "./approvalExecutor.js";
import { decodeClaimBatch } from "./claimBatch.js";
import type { ClaimBatch } from "./claimBatch.js";
import { ClaimRegistry, computeClaimId } from "./claimRegistry.js";
import { loadConfig } from "./config.js";
import type { IdentityConfig } from "./config.js";
import { EventJournal } from "./events.js";
import { KeyRegistry, keyIdForAddress } from "./keyRegistry.js";
import {
  AddressSchema,
  BytesSchema,
  ClaimIdSchema,
  ExecutionIdSchema,
  KeyIdSchema,
  KeyTypeSchema,
  PurposeSchema,
  SchemeSchema,
  TopicSchema,
  ValueSchema,
  parseInput
} from "./schemas.js";
import { decodeIdentityCall } from "./selfCall.js";
import { KeyPurpose, KeyType } from "./types.js";
import type {
  Address,
  CallDispatcher,
  ClaimId,
  ExternalCall,
  IdentityEventListener,
  KeyId,
  KeyPurposeCode,
  KeyTypeCode
} from "./types.js";

const AddKeyInputSchema = z.object({
  key: KeyIdSchema,
  purpose: PurposeSchema,
  keyType: KeyTypeSchema
});

const RemoveKeyInputSchema = z.object({
  key: KeyIdSchema,
  purpose: PurposeSchema
});

const ExecuteInputSchema = z.object({
  target: AddressSchema,
  value: ValueSchema,
  payload: BytesSchema
});

const ApproveInputSchema = z.object({
  executionId: ExecutionIdSchema,
  approve: z.boolean()
});

const ClaimInputSchema = z.object({
  topic: TopicSchema,
  scheme: SchemeSchema,
  issuer: AddressSchema,
  signature: BytesSchema,
  data: BytesSchema,
  uri: z.string().optional()
});

const ClaimBatchSchema = z.object({
  topics: z.array(TopicSchema),
  issuers: z.array(AddressSchema),
  signatures: BytesSchema,
  data: BytesSchema,
  dataLengths: z.array(z.number().int().min(0))
});

export type CreateIdentityOptions = {
  // The identity's own address; execution requests aimed here are self-calls.
  address: Address;
  owner: Address;
  config?: Partial<IdentityConfig>;
  dispatch?: CallDispatcher;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export type AddKeyInput = { key: KeyId; purpose: KeyPurposeCode; keyType: KeyTypeCode };
export type RemoveKeyInput = { key: KeyId; purpose: KeyPurposeCode };
export type ExecuteInput = { target: Address; value: bigint; payload: Uint8Array };
export type ApproveInput = { executionId: number; approve: boolean };
export type AddClaimInput = {
  topic: bigint;
  scheme: number;
  issuer: Address;
  signature: Uint8Array;
  data: Uint8Array;
  uri?: string;
};

/**
 * A single on-ledger-style identity: keys, threshold-approved executions and
 * claims behind one caller-aware surface.
 *
 * Every mutating operation is atomic. Inputs are validated and authorization
 * is checked before any state changes, and notifications are published to
 * subscribers only after the outermost operation returns.
 */
export class Identity {
  readonly address: Address;
  readonly config: IdentityConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly journal: EventJournal;
  private readonly keys: KeyRegistry;
  private readonly executor: ApprovalExecutor;
  private readonly claims: ClaimRegistry;
  private readonly externalDispatch: CallDispatcher | undefined;

  constructor(options: CreateIdentityOptions) {
    this.address = parseInput(AddressSchema, options.address);
    const owner = parseInput(AddressSchema, options.owner);
    this.config = { ...loadConfig(), ...options.config };
    this.logger =
      options.logger ?? createLogger({ service: "identity", level: this.config.logLevel });
    this.metrics = options.metrics ?? createMetricsRegistry({ service: "identity" });
    this.externalDispatch = options.dispatch;
    this.journal = new EventJournal(this.logger);
    this.keys = new KeyRegistry({ self: this.address, emit: this.journal.emit });
    this.executor = new ApprovalExecutor({
      keys: this.keys,
      emit: this.journal.emit,
      dispatch: (call) => this.route(call),
      limits: this.config,
      logger: this.logger
    });
    this.claims = new ClaimRegistry({ keys: this.keys, emit: this.journal.emit });

    this.journal.subscribe((event) => {
      if (event.type === "executed") {
        this.metrics.incCounter("identity_executions_total", { outcome: "succeeded" });
      } else if (event.type === "execution_failed") {
        this.metrics.incCounter("identity_executions_total", { outcome: "failed" });
      }
    });
    this.journal.transact(() =>
      this.keys.grant(keyIdForAddress(owner), KeyPurpose.MANAGEMENT, KeyType.ECDSA)
    );
    this.metrics.setGauge("identity_pending_executions", {}, 0);
    this.logger.info("identity_created", { address: this.address, owner });
  }

  subscribe(listener: IdentityEventListener) {
    return this.journal.subscribe(listener);
  }

  renderMetrics() {
    return this.metrics.render();
  }

  // Keys

  addKey(caller: Address, input: AddKeyInput) {
    return this.mutate("add_key", caller, (from) => {
      const parsed = parseInput(AddKeyInputSchema, input);
      return this.keys.addKey(from, parsed);
    });
  }

  removeKey(caller: Address, input: RemoveKeyInput) {
    return this.mutate("remove_key", caller, (from) => {
      const parsed = parseInput(RemoveKeyInputSchema, input);
      return this.keys.removeKey(from, parsed);
    });
  }

  getKey(key: KeyId) {
    return this.keys.getKey(key.toLowerCase());
  }

  getKeyPurposes(key: KeyId) {
    return this.keys.getKeyPurposes(key.toLowerCase());
  }

  getKeysByPurpose(purpose: KeyPurposeCode) {
    return this.keys.getKeysByPurpose(purpose);
  }

  keyHasPurpose(key: KeyId, purpose: KeyPurposeCode) {
    return this.keys.keyHasPurpose(key.toLowerCase(), purpose);
  }

  // Executions

  execute(caller: Address, input: ExecuteInput) {
    return this.mutate("execute", caller, (from) => {
      const parsed = parseInput(ExecuteInputSchema, input);
      return this.executor.execute(from, parsed);
    });
  }

  approve(caller: Address, input: ApproveInput) {
    return this.mutate("approve", caller, (from) => {
      const parsed = parseInput(ApproveInputSchema, input);
      return this.executor.approve(from, parsed);
    });
  }

  getExecution(executionId: number) {
    return this.executor.getExecution(executionId);
  }

  getPendingExecutions() {
    return this.executor.getPendingExecutions();
  }

  // Claims

  addClaim(caller: Address, input: AddClaimInput) {
    return this.mutate("add_claim", caller, (from) => {
      const parsed = parseInput(ClaimInputSchema, input);
      return this.claims.addClaim(from, parsed);
    });
  }

  addClaims(caller: Address, batch: ClaimBatch) {
    return this.mutate("add_claims", caller, (from) => {
      const parsed = parseInput(ClaimBatchSchema, batch);
      const inputs = decodeClaimBatch(parsed, {
        signatureBytes: this.config.batchSignatureBytes,
        maxClaims: this.config.maxBatchClaims
      });
      for (const input of inputs) {
        this.claims.assertCanAssert(from, input.issuer);
      }
      this.claims.writeAll(inputs);
      return true;
    });
  }

  removeClaim(caller: Address, claimId: ClaimId) {
    return this.mutate("remove_claim", caller, (from) => {
      const parsed = parseInput(ClaimIdSchema, claimId);
      return this.claims.removeClaim(from, parsed);
    });
  }

  getClaim(claimId: ClaimId) {
    return this.claims.getClaim(claimId.toLowerCase());
  }

  getClaimIdsByTopic(topic: bigint) {
    return this.claims.getClaimIdsByTopic(topic);
  }

  computeClaimId(issuer: Address, topic: bigint) {
    return computeClaimId(parseInput(AddressSchema, issuer), parseInput(TopicSchema, topic));
  }

  extractRange(buffer: Uint8Array, offset: number, length: number) {
    return extractRange(buffer, offset, length);
  }

  private mutate<T>(op: string, caller: Address, run: (from: Address) => T): T {
    let result: T;
    try {
      result = this.journal.transact(() => run(parseInput(AddressSchema, caller)));
    } catch (error) {
      this.logger.warn("identity_operation_rejected", {
        op,
        caller,
        code: isIdentityError(error) ? error.code : "internal_error",
        error
      });
      throw error;
    }
    this.metrics.incCounter("identity_operations_total", { op });
    this.metrics.setGauge("identity_pending_executions", {}, this.executor.pendingCount);
    this.logger.info("identity_operation", { op, caller });
    return result;
  }

  private route(call: ExternalCall) {
    if (call.target === this.address) {
      return this.runSelfCall(call.payload);
    }
    if (!this.externalDispatch) {
      this.logger.warn("external_dispatch_unavailable", { target: call.target });
      return false;
    }
    return this.externalDispatch(call);
  }

  private runSelfCall(payload: Uint8Array) {
    const call = decodeIdentityCall(payload);
    switch (call.method) {
      case "addKey":
        return this.addKey(this.address, call);
      case "removeKey":
        return this.removeKey(this.address, call);
      case "addClaim":
        this.addClaim(this.address, call);
        return true;
      case "removeClaim":
        return this.removeClaim(this.address, call.claimId);
    }
  }
}

export const createIdentity = (options: CreateIdentityOptions) => new Identity(options);
