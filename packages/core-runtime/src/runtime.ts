import { z } from "zod";
import {
  RecordingEventSink,
  RegistryError,
  isRegistryError,
  requireAddress,
  sameAddress,
} from "@trustledger/protocol-kernel";
import {
  Eip712DelegationVerifier,
  IdentityRegistry,
  type ProofOfControlVerifier,
  type RecipientDirectory,
} from "@trustledger/protocol-identity";
import { IncidentRegistry } from "@trustledger/protocol-incident";
import { ReputationRegistry } from "@trustledger/protocol-reputation";
import { ValidationRegistry } from "@trustledger/protocol-validation";
import type {
  ExecutionDomain,
  HexAddress,
  JournaledTransaction,
  LedgerEvent,
  TrustLedgerConfig,
  TxContext,
} from "@trustledger/shared-types";
import { LedgerDatabase, stringifyJson, toJsonSafe } from "@trustledger/state";
import { ensureRuntimeDirectories } from "./config.js";
import { lookupMethod, type Registries } from "./transactions.js";

const DOMAIN_KEY = "execution_domain";
const STARTED_AT_KEY = "started_at";

const storedDomainSchema = z.object({
  chainId: z.number(),
  identityRegistry: z.string(),
  reputationRegistry: z.string(),
  validationRegistry: z.string(),
  incidentRegistry: z.string(),
});

export interface TransactionRequest {
  caller: string;
  method: string;
  params?: unknown;
}

export interface TransactionReceipt {
  seq: number;
  id: string;
  method: string;
  caller: HexAddress;
  timestamp: number;
  /** JSON-safe return value of the method (bigints as strings). */
  result: unknown;
  events: LedgerEvent[];
}

export interface ReplayReport {
  transactions: number;
  lastSeq: number;
}

export type ReceiptListener = (receipt: TransactionReceipt) => void;

export interface RuntimeDependencies {
  db?: LedgerDatabase;
  verifier?: ProofOfControlVerifier;
  recipients?: RecipientDirectory;
  /** Unix seconds. */
  clock?: () => number;
}

/**
 * Composition root: the four registries over one event stream, with every
 * committed transaction journaled so the state can be rebuilt by replay.
 */
export class TrustLedger {
  readonly config: TrustLedgerConfig;
  readonly db: LedgerDatabase;
  readonly identity: IdentityRegistry;
  readonly reputation: ReputationRegistry;
  readonly validation: ValidationRegistry;
  readonly incident: IncidentRegistry;

  private readonly sink = new RecordingEventSink();
  private readonly registries: Registries;
  private readonly clock: () => number;
  private readonly listeners = new Set<ReceiptListener>();
  private queue: Promise<void> = Promise.resolve();
  private lastTimestamp = 0;
  private lastSeq = 0;
  private initialized = false;
  private halted: string | null = null;

  constructor(config: TrustLedgerConfig, dependencies: RuntimeDependencies = {}) {
    this.config = config;
    this.db = dependencies.db ?? new LedgerDatabase({ dbPath: config.dbPath });
    this.clock = dependencies.clock ?? (() => Math.floor(Date.now() / 1000));

    const { domain } = config;
    this.identity = new IdentityRegistry({
      verifier: dependencies.verifier ?? new Eip712DelegationVerifier(domain),
      recipients: dependencies.recipients,
      events: this.sink,
    });
    this.reputation = new ReputationRegistry({ authority: this.identity, events: this.sink });
    this.validation = new ValidationRegistry({
      authority: this.identity,
      chainId: domain.chainId,
      registryAddress: domain.validationRegistry,
      events: this.sink,
    });
    this.incident = new IncidentRegistry({ authority: this.identity, events: this.sink });
    this.registries = {
      identity: this.identity,
      reputation: this.reputation,
      validation: this.validation,
      incident: this.incident,
    };
  }

  /** Migrates the journal, pins the execution domain and replays history. */
  async initialize(): Promise<ReplayReport> {
    if (this.initialized) {
      return { transactions: this.lastSeq, lastSeq: this.lastSeq };
    }
    if (this.config.dbPath !== ":memory:") {
      ensureRuntimeDirectories(this.config);
    }

    this.db.runMigrations();
    this.pinDomain();
    if (!this.db.getKV(STARTED_AT_KEY)) {
      this.db.setKV(STARTED_AT_KEY, new Date().toISOString());
    }

    const report = await this.replay();
    this.initialized = true;
    this.db.insertAudit({
      category: "runtime",
      action: "initialize",
      details: `replayed ${report.transactions} transactions on chain ${this.config.domain.chainId}`,
    });
    this.debug(`initialized with ${report.transactions} journaled transactions`);
    return report;
  }

  /**
   * Runs one transaction after every earlier submission has settled. A
   * rejected transaction changes nothing and is not journaled.
   */
  submit(request: TransactionRequest): Promise<TransactionReceipt> {
    const run = this.queue.then(() => this.execute(request));
    // The submitter sees the failure; the queue only needs to know it settled.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  subscribe(listener: ReceiptListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  status(): {
    name: string;
    domain: ExecutionDomain;
    transactions: number;
    agents: number;
    incidents: number;
    halted: string | null;
    startedAt: string | null;
  } {
    return {
      name: this.config.name,
      domain: this.config.domain,
      transactions: this.lastSeq,
      agents: this.identity.totalAgents(),
      incidents: this.incident.totalIncidents(),
      halted: this.halted,
      startedAt: this.db.getKV(STARTED_AT_KEY),
    };
  }

  close(): void {
    this.listeners.clear();
    this.db.close();
  }

  // -------------------------------------------------------------------------
  // Execution

  private async execute(request: TransactionRequest): Promise<TransactionReceipt> {
    if (!this.initialized) {
      throw new Error("TrustLedger.initialize() must complete before submitting transactions");
    }
    if (this.halted) {
      throw new RegistryError("LEDGER_HALTED", `ledger halted: ${this.halted}`);
    }

    const timestamp = Math.max(this.clock(), this.lastTimestamp);
    const { caller, result, events } = await this.apply(request, timestamp);

    let journaled: JournaledTransaction;
    try {
      journaled = this.db.appendTransaction({
        timestamp,
        caller,
        method: request.method,
        params: request.params ?? {},
        events,
      });
    } catch (error) {
      // Memory now holds a write the journal does not; only a replay can recover.
      this.halted = `journal write failed for ${request.method}: ${errorMessage(error)}`;
      console.error(`[trustledger] ${this.halted}`);
      throw error;
    }

    this.lastTimestamp = timestamp;
    this.lastSeq = journaled.seq;
    const receipt: TransactionReceipt = {
      seq: journaled.seq,
      id: journaled.id,
      method: request.method,
      caller,
      timestamp,
      result: toJsonSafe(result ?? null),
      events,
    };
    this.debug(`committed #${receipt.seq} ${receipt.method} (${events.length} events)`);
    this.notify(receipt);
    return receipt;
  }

  private async apply(
    request: TransactionRequest,
    timestamp: number,
  ): Promise<{ caller: HexAddress; result: unknown; events: LedgerEvent[] }> {
    try {
      const caller = requireAddress(request.caller, "caller");
      const method = lookupMethod(request.method);
      this.sink.drain();
      const result = await method.run(this.registries, { caller, timestamp }, request.params);
      return { caller, result, events: this.sink.drain() };
    } catch (error) {
      this.sink.drain();
      this.recordRejection(request, error);
      throw error;
    }
  }

  private async replay(): Promise<ReplayReport> {
    let transactions = 0;
    for (const tx of this.db.iterateTransactions()) {
      const ctx: TxContext = { caller: tx.caller, timestamp: tx.timestamp };
      this.sink.drain();
      try {
        await lookupMethod(tx.method).run(this.registries, ctx, tx.params);
      } catch (error) {
        this.sink.drain();
        throw this.diverged(tx.seq, `${tx.method} failed on replay: ${errorMessage(error)}`);
      }

      const events = stringifyJson(this.sink.drain());
      if (events !== tx.events) {
        throw this.diverged(tx.seq, `${tx.method} emitted different events on replay`);
      }
      this.lastTimestamp = Math.max(this.lastTimestamp, tx.timestamp);
      this.lastSeq = tx.seq;
      transactions++;
    }
    return { transactions, lastSeq: this.lastSeq };
  }

  private pinDomain(): void {
    const expected = this.config.domain;
    const stored = this.db.getJsonKV(DOMAIN_KEY);
    if (stored === null) {
      this.db.setJsonKV(DOMAIN_KEY, expected);
      return;
    }

    const parsed = storedDomainSchema.safeParse(stored);
    const matches =
      parsed.success
      && parsed.data.chainId === expected.chainId
      && sameAddress(parsed.data.identityRegistry, expected.identityRegistry)
      && sameAddress(parsed.data.reputationRegistry, expected.reputationRegistry)
      && sameAddress(parsed.data.validationRegistry, expected.validationRegistry)
      && sameAddress(parsed.data.incidentRegistry, expected.incidentRegistry);
    if (!matches) {
      const error = new RegistryError("DOMAIN_MISMATCH", "journal was written under a different execution domain", {
        stored,
      });
      console.error(`[trustledger] ${error.message}`);
      throw error;
    }
  }

  private diverged(seq: number, message: string): RegistryError {
    const error = new RegistryError("REPLAY_DIVERGED", `transaction #${seq} ${message}`, { seq });
    this.halted = error.message;
    this.db.insertAudit({ category: "replay", action: "diverged", details: error.message });
    console.error(`[trustledger] ${error.message}`);
    return error;
  }

  private recordRejection(request: TransactionRequest, error: unknown): void {
    const code = isRegistryError(error) ? error.code : "UNEXPECTED";
    const kind = isRegistryError(error) ? error.kind : "integrity";
    if (kind === "integrity") {
      console.error(`[trustledger] ${request.method} failed: ${errorMessage(error)}`);
    } else {
      this.debug(`rejected ${request.method}: ${errorMessage(error)}`);
    }

    if (!this.config.auditRejections) {
      return;
    }
    this.db.insertAudit({
      category: "transaction",
      action: "rejected",
      details: stringifyJson({ method: request.method, caller: request.caller, code, kind }),
    });
  }

  private notify(receipt: TransactionReceipt): void {
    for (const listener of this.listeners) {
      try {
        listener(receipt);
      } catch (error) {
        console.warn(`[trustledger] receipt listener failed: ${errorMessage(error)}`);
      }
    }
  }

  private debug(message: string): void {
    if (this.config.debug) {
      console.warn(`[trustledger] ${message}`);
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
