import { fail } from "@idcore/shared";
import type { Logger } from "@idcore/shared";
import { keyIdForAddress } from "./keyRegistry.js";
import type { KeyRegistry } from "./keyRegistry.js";
import { KeyPurpose } from "./types.js";
import type {
  Address,
  CallDispatcher,
  Emit,
  ExecutionRequest,
  ExecutionStatus,
  KeyId,
  KeyPurposeCode
} from "./types.js";

type ExecutionEntry = {
  id: number;
  target: Address;
  value: bigint;
  payload: Uint8Array;
  requiredPurpose: KeyPurposeCode;
  approvals: Set<KeyId>;
  status: ExecutionStatus;
  succeeded?: boolean;
};

export type ExecutorLimits = {
  managementThreshold: number;
  actionThreshold: number;
  maxPendingExecutions: number;
};

const APPROVER_PURPOSES = [KeyPurpose.MANAGEMENT, KeyPurpose.ACTION];

const snapshot = (entry: ExecutionEntry): ExecutionRequest => {
  const request: ExecutionRequest = {
    id: entry.id,
    target: entry.target,
    value: entry.value,
    payload: entry.payload.slice(),
    requiredPurpose: entry.requiredPurpose,
    approvals: [...entry.approvals],
    status: entry.status
  };
  if (entry.succeeded !== undefined) {
    request.succeeded = entry.succeeded;
  }
  return request;
};

/**
 * Threshold-gated execution of arbitrary calls.
 *
 * Requests aimed at the identity itself need MANAGEMENT approvals; any other
 * target needs ACTION approvals, where MANAGEMENT keys count as ACTION too.
 * Approvals are weighed against the approvers' current purposes every time,
 * so a key that loses its purpose stops counting.
 *
 * A request runs its call at most once. The call result is recorded and
 * returned, never thrown, and a failed call is not retried.
 *
 * Executed requests are kept for the identity's lifetime so getExecution can
 * report their outcome; only pending requests count against
 * maxPendingExecutions.
 */
export class ApprovalExecutor {
  private readonly keys: KeyRegistry;
  private readonly emit: Emit;
  private readonly dispatch: CallDispatcher;
  private readonly limits: ExecutorLimits;
  private readonly logger: Logger;
  private readonly selfKey: KeyId;
  private readonly executions = new Map<number, ExecutionEntry>();
  private nextId = 0;
  private pending = 0;

  constructor(input: {
    keys: KeyRegistry;
    emit: Emit;
    dispatch: CallDispatcher;
    limits: ExecutorLimits;
    logger: Logger;
  }) {
    this.keys = input.keys;
    this.emit = input.emit;
    this.dispatch = input.dispatch;
    this.limits = input.limits;
    this.logger = input.logger;
    this.selfKey = keyIdForAddress(input.keys.self);
  }

  execute(caller: Address, input: { target: Address; value: bigint; payload: Uint8Array }) {
    this.keys.assertCallerHasAny(caller, APPROVER_PURPOSES, "execute");
    if (this.pending >= this.limits.maxPendingExecutions) {
      fail(
        "capacity_exceeded",
        "pending_executions_exhausted",
        `limit=${this.limits.maxPendingExecutions}`
      );
    }
    const approver = keyIdForAddress(caller);
    const entry: ExecutionEntry = {
      id: this.nextId,
      target: input.target,
      value: input.value,
      payload: input.payload.slice(),
      requiredPurpose: input.target === this.keys.self ? KeyPurpose.MANAGEMENT : KeyPurpose.ACTION,
      approvals: new Set([approver]),
      status: "pending"
    };
    this.nextId += 1;
    this.executions.set(entry.id, entry);
    this.pending += 1;

    this.emit({
      type: "execution_requested",
      executionId: entry.id,
      target: entry.target,
      value: entry.value,
      payload: entry.payload.slice()
    });
    this.emit({ type: "execution_approved", executionId: entry.id, approver, approved: true });
    this.runIfApproved(entry);
    return entry.id;
  }

  approve(caller: Address, input: { executionId: number; approve: boolean }) {
    this.keys.assertCallerHasAny(caller, APPROVER_PURPOSES, "approve");
    const entry = this.executions.get(input.executionId);
    if (!entry) {
      return fail("not_found", "execution_not_found", `id=${input.executionId}`);
    }
    if (entry.status === "executed") {
      return fail("not_found", "execution_already_executed", `id=${input.executionId}`);
    }
    const approver = keyIdForAddress(caller);
    if (input.approve) {
      entry.approvals.add(approver);
    } else {
      entry.approvals.delete(approver);
    }
    this.emit({
      type: "execution_approved",
      executionId: entry.id,
      approver,
      approved: input.approve
    });
    return this.runIfApproved(entry);
  }

  getExecution(executionId: number) {
    const entry = this.executions.get(executionId);
    return entry ? snapshot(entry) : null;
  }

  getPendingExecutions() {
    return [...this.executions.values()]
      .filter((entry) => entry.status === "pending")
      .map((entry) => snapshot(entry));
  }

  get pendingCount() {
    return this.pending;
  }

  private thresholdMet(entry: ExecutionEntry) {
    let management = 0;
    let action = 0;
    for (const key of entry.approvals) {
      if (key === this.selfKey || this.keys.keyHasPurpose(key, KeyPurpose.MANAGEMENT)) {
        management += 1;
        action += 1;
      } else if (this.keys.keyHasPurpose(key, KeyPurpose.ACTION)) {
        action += 1;
      }
    }
    if (management >= this.limits.managementThreshold) {
      return true;
    }
    return entry.requiredPurpose === KeyPurpose.ACTION && action >= this.limits.actionThreshold;
  }

  private runIfApproved(entry: ExecutionEntry) {
    if (entry.status !== "pending" || !this.thresholdMet(entry)) {
      return false;
    }
    // Marked terminal before the call so a re-entrant approve cannot run it twice.
    entry.status = "executed";
    this.pending -= 1;
    const succeeded = this.invoke(entry);
    entry.succeeded = succeeded;
    this.emit({
      type: succeeded ? "executed" : "execution_failed",
      executionId: entry.id,
      target: entry.target,
      value: entry.value,
      payload: entry.payload.slice()
    });
    return succeeded;
  }

  private invoke(entry: ExecutionEntry) {
    try {
      return this.dispatch({
        from: this.keys.self,
        target: entry.target,
        value: entry.value,
        payload: entry.payload.slice()
      });
    } catch (error) {
      this.logger.warn("execution_call_failed", { executionId: entry.id, target: entry.target, error });
      return false;
    }
  }
}
