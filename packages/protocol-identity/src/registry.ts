import {
  MAX_DELEGATION_DEADLINE_DELAY_SEC,
  MAX_METADATA_KEY_LENGTH,
  MAX_URI_LENGTH,
  NULL_EVENT_SINK,
  RESERVED_METADATA_KEY,
  RegistryError,
  ZERO_ADDRESS,
  normalizeAddress,
  optionalBytes32,
  requireAddress,
  requireHexBytes,
  requireId,
  requireMaxLength,
  requireNonEmpty,
  sameAddress,
  type AgentAuthority,
  type DistributiveOmit,
  type EventSink,
} from "@trustledger/protocol-kernel";
import type {
  AgentView,
  Bytes32,
  DelegationMessage,
  DelegationProof,
  HexAddress,
  HexBytes,
  IdentityEvent,
  MetadataEntry,
  TxContext,
} from "@trustledger/shared-types";
import type { ProofOfControlVerifier } from "./delegation.js";
import { createIdentityStore, type AgentRecord, type IdentityStore } from "./store.js";

/**
 * Receiving side of a safe transfer. Addresses without a registered receiver
 * accept transfers unconditionally.
 */
export interface AgentReceiver {
  onAgentReceived(input: { operator: HexAddress; from: HexAddress; agentId: number; data: HexBytes }): boolean;
}

export interface RecipientDirectory {
  receiverFor(address: HexAddress): AgentReceiver | undefined;
}

export interface IdentityRegistryOptions {
  verifier: ProofOfControlVerifier;
  store?: IdentityStore;
  events?: EventSink;
  recipients?: RecipientDirectory;
}

export class IdentityRegistry implements AgentAuthority {
  private readonly store: IdentityStore;
  private readonly events: EventSink;
  private readonly verifier: ProofOfControlVerifier;
  private readonly recipients?: RecipientDirectory;

  constructor(options: IdentityRegistryOptions) {
    this.store = options.store ?? createIdentityStore();
    this.events = options.events ?? NULL_EVENT_SINK;
    this.verifier = options.verifier;
    this.recipients = options.recipients;
  }

  // -------------------------------------------------------------------------
  // Registration

  register(ctx: TxContext): number;
  register(ctx: TxContext, uri: string): number;
  register(ctx: TxContext, uri: string, metadata: MetadataEntry[]): number;
  register(ctx: TxContext, uri = "", metadata: MetadataEntry[] = []): number {
    const owner = requireAddress(ctx.caller, "caller");
    requireMaxLength(uri, MAX_URI_LENGTH, "uri");
    const entries = metadata.map((entry) => ({
      key: this.checkMetadataKey(entry.key),
      value: requireHexBytes(entry.value, `metadata[${entry.key}]`),
    }));

    return this.mint(ctx, owner, uri, entries);
  }

  private mint(ctx: TxContext, owner: HexAddress, uri: string, metadata: MetadataEntry[]): number {
    const agentId = this.store.nextAgentId;
    const record: AgentRecord = {
      agentId,
      owner,
      uri,
      uriHash: null,
      metadata: new Map(metadata.map((entry) => [entry.key, entry.value])),
      agentWallet: null,
      approved: null,
      active: true,
      walletNonce: 0,
      createdAt: ctx.timestamp,
      updatedAt: ctx.timestamp,
    };

    this.store.nextAgentId = agentId + 1;
    this.store.agents.set(agentId, record);
    this.addHolding(owner, agentId);

    this.emit({ type: "Transfer", from: ZERO_ADDRESS, to: owner, agentId });
    this.emit({ type: "Registered", agentId, owner, uri });
    for (const entry of metadata) {
      this.emit({ type: "MetadataSet", agentId, key: entry.key, value: entry.value, updatedBy: owner });
    }
    return agentId;
  }

  // -------------------------------------------------------------------------
  // Owner-managed fields

  setAgentURI(ctx: TxContext, agentId: number, uri: string, uriHash?: Bytes32): void {
    const record = this.requireRecord(agentId);
    this.requireOwnerOrOperator(record, ctx.caller);
    requireMaxLength(uri, MAX_URI_LENGTH, "uri");
    const hash = optionalBytes32(uriHash, "uriHash");

    record.uri = uri;
    record.uriHash = hash;
    record.updatedAt = ctx.timestamp;
    this.emit({ type: "UriUpdated", agentId, uri, uriHash: hash, updatedBy: ctx.caller });
  }

  setMetadata(ctx: TxContext, agentId: number, key: string, value: HexBytes): void {
    const record = this.requireRecord(agentId);
    this.requireOwnerOrOperator(record, ctx.caller);
    this.checkMetadataKey(key);
    requireHexBytes(value, `metadata[${key}]`);

    record.metadata.set(key, value);
    record.updatedAt = ctx.timestamp;
    this.emit({ type: "MetadataSet", agentId, key, value, updatedBy: ctx.caller });
  }

  deactivate(ctx: TxContext, agentId: number): void {
    const record = this.requireRecord(agentId);
    this.requireOwner(record, ctx.caller);
    if (!record.active) {
      throw new RegistryError("ALREADY_INACTIVE", `agent ${agentId} is already inactive`, { agentId });
    }

    record.active = false;
    record.updatedAt = ctx.timestamp;
    this.emit({ type: "AgentDeactivated", agentId, owner: record.owner });
  }

  reactivate(ctx: TxContext, agentId: number): void {
    const record = this.requireRecord(agentId);
    this.requireOwner(record, ctx.caller);
    if (record.active) {
      throw new RegistryError("ALREADY_ACTIVE", `agent ${agentId} is already active`, { agentId });
    }

    record.active = true;
    record.updatedAt = ctx.timestamp;
    this.emit({ type: "AgentReactivated", agentId, owner: record.owner });
  }

  // -------------------------------------------------------------------------
  // Delegated wallet

  /**
   * Binds `proof.wallet` as the agent's operational wallet. The wallet itself
   * must have signed the current owner and nonce, so a proof cannot be
   * replayed after a transfer or a previous delegation.
   */
  async setAgentWallet(ctx: TxContext, agentId: number, proof: DelegationProof): Promise<void> {
    const record = this.requireRecord(agentId);
    this.requireOwnerOrOperator(record, ctx.caller);
    const wallet = requireAddress(proof.wallet, "wallet");
    requireId(proof.deadline, "deadline");

    if (proof.deadline < ctx.timestamp) {
      throw new RegistryError("SIGNATURE_EXPIRED", `delegation proof expired at ${proof.deadline}`, {
        agentId,
        deadline: proof.deadline,
      });
    }
    if (proof.deadline > ctx.timestamp + MAX_DELEGATION_DEADLINE_DELAY_SEC) {
      throw new RegistryError(
        "DEADLINE_TOO_FAR",
        `deadline must be within ${MAX_DELEGATION_DEADLINE_DELAY_SEC}s of the transaction`,
        { agentId, deadline: proof.deadline },
      );
    }

    const message: DelegationMessage = {
      agentId,
      wallet,
      owner: record.owner,
      nonce: record.walletNonce,
      deadline: proof.deadline,
    };
    const valid = await this.verifier.verify(message, proof.signature);

    // Ownership, approvals or nonce may have moved while the proof was being checked.
    this.requireOwnerOrOperator(record, ctx.caller);
    if (!valid || record.owner !== message.owner || record.walletNonce !== message.nonce) {
      throw new RegistryError("INVALID_SIGNATURE", `delegation proof not signed by ${wallet}`, { agentId, wallet });
    }

    record.agentWallet = wallet;
    record.walletNonce = message.nonce + 1;
    record.updatedAt = ctx.timestamp;
    this.emit({ type: "AgentWalletSet", agentId, wallet, setBy: ctx.caller, nonce: message.nonce });
  }

  /** Clearing needs no proof: it only ever removes authority. */
  unsetAgentWallet(ctx: TxContext, agentId: number): void {
    const record = this.requireRecord(agentId);
    this.requireOwnerOrOperator(record, ctx.caller);
    const previousWallet = record.agentWallet;
    if (!previousWallet) {
      throw new RegistryError("WALLET_NOT_SET", `agent ${agentId} has no delegated wallet`, { agentId });
    }

    record.agentWallet = null;
    record.updatedAt = ctx.timestamp;
    this.emit({ type: "AgentWalletCleared", agentId, previousWallet, reason: "unset" });
  }

  // -------------------------------------------------------------------------
  // Approvals and transfer

  approve(ctx: TxContext, approved: HexAddress | null, agentId: number): void {
    const record = this.requireRecord(agentId);
    const caller = ctx.caller;
    if (!sameAddress(record.owner, caller) && !this.isApprovedForAll(record.owner, caller)) {
      throw new RegistryError("NOT_AUTHORIZED", `${caller} may not approve for agent ${agentId}`, { agentId });
    }
    const next = approved === null ? null : normalizeAddress(approved);
    if (approved !== null && next === null) {
      throw new RegistryError("INVALID_ADDRESS", "approved is not a 20-byte hex address", { field: "approved" });
    }

    record.approved = next === ZERO_ADDRESS ? null : next;
    this.emit({ type: "Approval", owner: record.owner, approved: record.approved, agentId });
  }

  setApprovalForAll(ctx: TxContext, operator: HexAddress, approved: boolean): void {
    const owner = requireAddress(ctx.caller, "caller");
    const normalized = requireAddress(operator, "operator");
    if (normalized === owner) {
      throw new RegistryError("INVALID_ARGUMENT", "operator must differ from caller", { operator });
    }

    const operators = this.store.operators.get(owner) ?? new Set<HexAddress>();
    if (approved) {
      operators.add(normalized);
    } else {
      operators.delete(normalized);
    }
    this.store.operators.set(owner, operators);
    this.emit({ type: "ApprovalForAll", owner, operator: normalized, approved });
  }

  transferFrom(ctx: TxContext, from: HexAddress, to: HexAddress, agentId: number): void {
    const record = this.checkTransfer(ctx, from, to, agentId);
    this.applyTransfer(record, requireAddress(to, "to"));
  }

  safeTransferFrom(ctx: TxContext, from: HexAddress, to: HexAddress, agentId: number, data: HexBytes = "0x"): void {
    const record = this.checkTransfer(ctx, from, to, agentId);
    const recipient = requireAddress(to, "to");
    const payload = requireHexBytes(data, "data");
    const receiver = this.recipients?.receiverFor(recipient);
    if (receiver) {
      const acknowledged = receiver.onAgentReceived({
        operator: ctx.caller,
        from: record.owner,
        agentId,
        data: payload,
      });
      if (!acknowledged) {
        throw new RegistryError("TRANSFER_REJECTED", `${recipient} did not acknowledge agent ${agentId}`, {
          agentId,
          to: recipient,
        });
      }
    }
    this.applyTransfer(record, recipient);
  }

  private checkTransfer(ctx: TxContext, from: HexAddress, to: HexAddress, agentId: number): AgentRecord {
    const record = this.requireRecord(agentId);
    requireAddress(to, "to");
    if (!sameAddress(record.owner, from)) {
      throw new RegistryError("NOT_OWNER", `${from} does not own agent ${agentId}`, { agentId, from });
    }
    this.requireOwnerOrOperator(record, ctx.caller);
    return record;
  }

  private applyTransfer(record: AgentRecord, to: HexAddress): void {
    const from = record.owner;
    const previousWallet = record.agentWallet;

    this.removeHolding(from, record.agentId);
    this.addHolding(to, record.agentId);
    record.owner = to;
    record.approved = null;
    record.agentWallet = null;

    this.emit({ type: "Transfer", from, to, agentId: record.agentId });
    if (previousWallet) {
      this.emit({ type: "AgentWalletCleared", agentId: record.agentId, previousWallet, reason: "transfer" });
    }
  }

  // -------------------------------------------------------------------------
  // Queries

  agentExists(agentId: number): boolean {
    return this.store.agents.has(agentId);
  }

  ownerOf(agentId: number): HexAddress {
    return this.requireRecord(agentId).owner;
  }

  agentWalletOf(agentId: number): HexAddress | null {
    return this.requireRecord(agentId).agentWallet;
  }

  /** Zero address when no wallet is delegated. */
  getAgentWallet(agentId: number): HexAddress {
    return this.requireRecord(agentId).agentWallet ?? ZERO_ADDRESS;
  }

  agentURI(agentId: number): string {
    return this.requireRecord(agentId).uri;
  }

  getMetadata(agentId: number, key: string): HexBytes | null {
    if (key === RESERVED_METADATA_KEY) {
      return this.requireRecord(agentId).agentWallet;
    }
    return this.requireRecord(agentId).metadata.get(key) ?? null;
  }

  isActive(agentId: number): boolean {
    return this.requireRecord(agentId).active;
  }

  walletNonce(agentId: number): number {
    return this.requireRecord(agentId).walletNonce;
  }

  getApproved(agentId: number): HexAddress | null {
    return this.requireRecord(agentId).approved;
  }

  isApprovedForAll(owner: HexAddress, operator: HexAddress): boolean {
    const normalizedOwner = normalizeAddress(owner);
    const normalizedOperator = normalizeAddress(operator);
    if (!normalizedOwner || !normalizedOperator) {
      return false;
    }
    return this.store.operators.get(normalizedOwner)?.has(normalizedOperator) ?? false;
  }

  agentsOf(owner: HexAddress): number[] {
    const normalized = requireAddress(owner, "owner");
    return [...(this.store.holdings.get(normalized) ?? [])];
  }

  totalAgents(): number {
    return this.store.agents.size;
  }

  getAgent(agentId: number): AgentView {
    const record = this.requireRecord(agentId);
    return {
      agentId: record.agentId,
      owner: record.owner,
      uri: record.uri,
      uriHash: record.uriHash,
      metadata: Object.fromEntries(record.metadata),
      agentWallet: record.agentWallet,
      approved: record.approved,
      active: record.active,
      walletNonce: record.walletNonce,
      createdAt: record.createdAt,
      updatedAt: record.updatedAt,
    };
  }

  /** Message the wallet must sign for the agent's next delegation. */
  delegationMessage(agentId: number, wallet: HexAddress, deadline: number): DelegationMessage {
    const record = this.requireRecord(agentId);
    return {
      agentId,
      wallet: requireAddress(wallet, "wallet"),
      owner: record.owner,
      nonce: record.walletNonce,
      deadline,
    };
  }

  // -------------------------------------------------------------------------
  // Internals

  private requireRecord(agentId: number): AgentRecord {
    const record = this.store.agents.get(agentId);
    if (!record) {
      throw new RegistryError("AGENT_NOT_FOUND", `agent ${agentId} does not exist`, { agentId });
    }
    return record;
  }

  private requireOwner(record: AgentRecord, caller: HexAddress): void {
    if (!sameAddress(record.owner, caller)) {
      throw new RegistryError("NOT_AUTHORIZED", `${caller} is not the owner of agent ${record.agentId}`, {
        agentId: record.agentId,
      });
    }
  }

  private requireOwnerOrOperator(record: AgentRecord, caller: HexAddress): void {
    if (
      sameAddress(record.owner, caller)
      || sameAddress(record.approved, caller)
      || this.isApprovedForAll(record.owner, caller)
    ) {
      return;
    }
    throw new RegistryError("NOT_AUTHORIZED", `${caller} may not manage agent ${record.agentId}`, {
      agentId: record.agentId,
    });
  }

  private checkMetadataKey(key: string): string {
    requireNonEmpty(key, MAX_METADATA_KEY_LENGTH, "metadata key");
    if (key === RESERVED_METADATA_KEY) {
      throw new RegistryError("RESERVED_METADATA_KEY", `${RESERVED_METADATA_KEY} is set through delegation only`, {
        key,
      });
    }
    return key;
  }

  private addHolding(owner: HexAddress, agentId: number): void {
    const holdings = this.store.holdings.get(owner) ?? [];
    holdings.push(agentId);
    this.store.holdings.set(owner, holdings);
  }

  private removeHolding(owner: HexAddress, agentId: number): void {
    const holdings = this.store.holdings.get(owner) ?? [];
    this.store.holdings.set(owner, holdings.filter((id) => id !== agentId));
  }

  private emit(event: DistributiveOmit<IdentityEvent, "registry">): void {
    this.events.emit({ registry: "identity", ...event });
  }
}
