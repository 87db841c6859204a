import {
  DEFAULT_COMPLETION_RESPONSE,
  DEFAULT_REJECTION_RESPONSE,
  MAX_TAG_LENGTH,
  MAX_URI_LENGTH,
  NULL_EVENT_SINK,
  RegistryError,
  VALIDATION_RESPONSE_MAX,
  VALIDATION_RESPONSE_MIN,
  normalizeAddress,
  normalizeBytes32,
  optionalBytes32,
  requireAddress,
  requireAgent,
  requireBytes32,
  requireMaxLength,
  sameAddress,
  type AgentAuthority,
  type DistributiveOmit,
  type EventSink,
} from "@trustledger/protocol-kernel";
import type {
  Bytes32,
  HexAddress,
  TxContext,
  ValidationEvent,
  ValidationFilter,
  ValidationOutcomeInput,
  ValidationRequestInput,
  ValidationRequestView,
  ValidationStatusView,
  ValidationSummary,
} from "@trustledger/shared-types";
import { defaultContentHash, deriveRequestId } from "./request-id.js";
import { createValidationStore, type ValidationRecord, type ValidationStore } from "./store.js";

export interface ValidationRegistryOptions {
  authority: AgentAuthority;
  chainId: number;
  /** Address of this registry; part of the id derivation domain. */
  registryAddress: HexAddress;
  store?: ValidationStore;
  events?: EventSink;
}

type Decision = "completed" | "rejected";

export class ValidationRegistry {
  private readonly authority: AgentAuthority;
  private readonly chainId: number;
  private readonly registryAddress: HexAddress;
  private readonly store: ValidationStore;
  private readonly events: EventSink;

  constructor(options: ValidationRegistryOptions) {
    this.authority = options.authority;
    this.chainId = options.chainId;
    this.registryAddress = requireAddress(options.registryAddress, "registryAddress");
    this.store = options.store ?? createValidationStore();
    this.events = options.events ?? NULL_EVENT_SINK;
  }

  requestValidation(ctx: TxContext, input: ValidationRequestInput): Bytes32 {
    const requester = requireAddress(ctx.caller, "caller");
    const validator = requireAddress(input.validator, "validator");
    requireAgent(this.authority, input.agentId);
    const requestURI = requireMaxLength(input.requestURI, MAX_URI_LENGTH, "requestURI");
    const contentHash =
      optionalBytes32(input.contentHash, "contentHash")
      ?? defaultContentHash(requester, validator, input.agentId, requestURI);

    const nonce = this.store.nonces.get(requester) ?? 0;
    const requestId = deriveRequestId({
      requester,
      validator,
      agentId: input.agentId,
      contentHash,
      nonce,
      chainId: this.chainId,
      registry: this.registryAddress,
    });
    if (this.store.requests.has(requestId)) {
      throw new RegistryError("ID_COLLISION", `derived request id ${requestId} already exists`, {
        requestId,
        requester,
        nonce,
      });
    }

    const record: ValidationRecord = {
      requestId,
      requester,
      validator,
      agentId: input.agentId,
      contentHash,
      requestURI,
      nonce,
      status: "pending",
      response: null,
      responseDefaulted: false,
      responseURI: "",
      responseHash: null,
      tag: "",
      createdAt: ctx.timestamp,
      completedAt: null,
    };

    this.store.requests.set(requestId, record);
    this.store.nonces.set(requester, nonce + 1);
    pushIndex(this.store.byAgent, input.agentId, requestId);
    pushIndex(this.store.byValidator, validator, requestId);
    pushIndex(this.store.byRequester, requester, requestId);

    this.emit({
      type: "ValidationRequested",
      requestId,
      requester,
      validator,
      agentId: input.agentId,
      requestURI,
      contentHash,
      nonce,
      createdAt: ctx.timestamp,
    });
    return requestId;
  }

  /** Without an explicit response the outcome is DEFAULT_COMPLETION_RESPONSE. */
  completeValidation(ctx: TxContext, requestId: string, outcome: ValidationOutcomeInput = {}): void {
    this.decide(ctx, requestId, "completed", outcome);
  }

  /** Without an explicit response the outcome is DEFAULT_REJECTION_RESPONSE. */
  rejectValidation(ctx: TxContext, requestId: string, outcome: ValidationOutcomeInput = {}): void {
    this.decide(ctx, requestId, "rejected", outcome);
  }

  cancelValidation(ctx: TxContext, requestId: string): void {
    const record = this.requireRequest(requestId);
    if (!sameAddress(record.requester, ctx.caller)) {
      throw new RegistryError("NOT_AUTHORIZED", `only the requester may cancel ${record.requestId}`, {
        requestId: record.requestId,
      });
    }
    requirePending(record);

    record.status = "cancelled";
    record.completedAt = ctx.timestamp;
    this.emit({
      type: "ValidationCancelled",
      requestId: record.requestId,
      requester: record.requester,
      agentId: record.agentId,
      status: "cancelled",
      completedAt: ctx.timestamp,
    });
  }

  private decide(ctx: TxContext, requestId: string, status: Decision, outcome: ValidationOutcomeInput): void {
    const record = this.requireRequest(requestId);
    if (!sameAddress(record.validator, ctx.caller)) {
      throw new RegistryError("NOT_AUTHORIZED", `only the named validator may decide ${record.requestId}`, {
        requestId: record.requestId,
      });
    }
    requirePending(record);

    const responseDefaulted = outcome.response === undefined;
    const response = outcome.response ?? (status === "completed" ? DEFAULT_COMPLETION_RESPONSE : DEFAULT_REJECTION_RESPONSE);
    if (!Number.isInteger(response) || response < VALIDATION_RESPONSE_MIN || response > VALIDATION_RESPONSE_MAX) {
      throw new RegistryError(
        "INVALID_ARGUMENT",
        `response must be an integer between ${VALIDATION_RESPONSE_MIN} and ${VALIDATION_RESPONSE_MAX}`,
        { response },
      );
    }
    const responseURI = requireMaxLength(outcome.responseURI ?? "", MAX_URI_LENGTH, "responseURI");
    const responseHash = optionalBytes32(outcome.responseHash, "responseHash");
    const tag = requireMaxLength(outcome.tag ?? "", MAX_TAG_LENGTH, "tag");

    record.status = status;
    record.response = response;
    record.responseDefaulted = responseDefaulted;
    record.responseURI = responseURI;
    record.responseHash = responseHash;
    record.tag = tag;
    record.completedAt = ctx.timestamp;

    this.emit({
      type: status === "completed" ? "ValidationCompleted" : "ValidationRejected",
      requestId: record.requestId,
      validator: record.validator,
      agentId: record.agentId,
      status,
      response,
      responseDefaulted,
      responseURI,
      responseHash,
      tag,
      completedAt: ctx.timestamp,
    });
  }

  // -------------------------------------------------------------------------
  // Queries

  requestExists(requestId: string): boolean {
    const normalized = normalizeBytes32(requestId);
    return normalized !== null && this.store.requests.has(normalized);
  }

  getRequest(requestId: string): ValidationRequestView {
    return { ...this.requireRequest(requestId) };
  }

  getStatus(requestId: string): ValidationStatusView {
    const record = this.requireRequest(requestId);
    return {
      requestId: record.requestId,
      status: record.status,
      validator: record.validator,
      agentId: record.agentId,
      response: record.response,
      tag: record.tag,
      lastUpdate: record.completedAt ?? record.createdAt,
    };
  }

  getAgentValidations(agentId: number): Bytes32[] {
    requireAgent(this.authority, agentId);
    return [...(this.store.byAgent.get(agentId) ?? [])];
  }

  getValidatorRequests(validator: HexAddress): Bytes32[] {
    return [...(this.store.byValidator.get(requireAddress(validator, "validator")) ?? [])];
  }

  getRequesterRequests(requester: HexAddress): Bytes32[] {
    return [...(this.store.byRequester.get(requireAddress(requester, "requester")) ?? [])];
  }

  /** Sequence number the requester's next request will use. */
  requesterNonce(requester: HexAddress): number {
    return this.store.nonces.get(requireAddress(requester, "requester")) ?? 0;
  }

  /**
   * Counts per status. `averageResponse` is the floored mean over completed and
   * rejected requests, null when none are decided. A tag filter matches the
   * tag recorded at decision time, so it never matches pending requests.
   */
  getSummary(agentId: number, filter: ValidationFilter = {}): ValidationSummary {
    const validators = (filter.validators ?? []).map((address) => normalizeAddress(address) ?? address);
    const tag = filter.tag ?? "";
    const summary: ValidationSummary = {
      agentId,
      total: 0,
      pending: 0,
      completed: 0,
      rejected: 0,
      cancelled: 0,
      averageResponse: null,
    };

    let responseTotal = 0;
    for (const requestId of this.getAgentValidations(agentId)) {
      const record = this.requireRequest(requestId);
      if (validators.length > 0 && !validators.some((validator) => sameAddress(validator, record.validator))) {
        continue;
      }
      if (tag && record.tag !== tag) {
        continue;
      }

      summary.total++;
      summary[record.status]++;
      if (record.response !== null) {
        responseTotal += record.response;
      }
    }

    const decided = summary.completed + summary.rejected;
    summary.averageResponse = decided > 0 ? Math.floor(responseTotal / decided) : null;
    return summary;
  }

  // -------------------------------------------------------------------------
  // Internals

  private requireRequest(requestId: string): ValidationRecord {
    const key = requireBytes32(requestId, "requestId");
    const record = this.store.requests.get(key);
    if (!record) {
      throw new RegistryError("REQUEST_NOT_FOUND", `validation request ${key} does not exist`, { requestId: key });
    }
    return record;
  }

  private emit(event: DistributiveOmit<ValidationEvent, "registry">): void {
    this.events.emit({ registry: "validation", ...event });
  }
}

function requirePending(record: ValidationRecord): void {
  if (record.status !== "pending") {
    throw new RegistryError("INVALID_STATUS", `request ${record.requestId} is ${record.status}, not pending`, {
      requestId: record.requestId,
      status: record.status,
    });
  }
}

function pushIndex<K>(index: Map<K, Bytes32[]>, key: K, requestId: Bytes32): void {
  const ids = index.get(key) ?? [];
  ids.push(requestId);
  index.set(key, ids);
}
