import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { monotonicFactory } from "ulid";
import type {
  AuditEntry,
  HexAddress,
  JournaledEvent,
  JournaledTransaction,
  LedgerEvent,
  RegistryName,
} from "@trustledger/shared-types";
import { parseJsonRecord, stringifyJson } from "./json.js";
import { CREATE_BASE_TABLES, SCHEMA_VERSION } from "./schema.js";

interface KvRow {
  value: string;
}

interface CountRow {
  count: number;
}

interface VersionRow {
  version: number | null;
}

interface TransactionRow {
  seq: number;
  id: string;
  timestamp: number;
  caller: HexAddress;
  method: string;
  params: string;
  events: string;
  committedAt: string;
}

interface EventRow {
  id: string;
  txSeq: number;
  logIndex: number;
  registry: RegistryName;
  type: string;
  agentId: number | null;
  timestamp: number;
  payload: string;
}

/** ULIDs that sort in insertion order within one process. */
const nextId = monotonicFactory();

const TRANSACTION_COLUMNS =
  "seq, id, timestamp, caller, method, params, events, committed_at as committedAt";
const EVENT_COLUMNS =
  "id, tx_seq as txSeq, log_index as logIndex, registry, type, agent_id as agentId, timestamp, payload";

export interface DatabaseOptions {
  /** File path, or ":memory:" for a throwaway journal. */
  dbPath: string;
}

export interface AppendTransactionInput {
  id?: string;
  timestamp: number;
  caller: HexAddress;
  method: string;
  params: unknown;
  events: LedgerEvent[];
}

export interface EventQuery {
  registry?: RegistryName;
  agentId?: number;
  type?: string;
  afterSeq?: number;
  limit?: number;
}

export class LedgerDatabase {
  private readonly db: Database.Database;

  constructor(options: DatabaseOptions) {
    if (options.dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(options.dbPath), { recursive: true, mode: 0o700 });
    }
    this.db = new Database(options.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
  }

  runMigrations(): void {
    this.db.exec(CREATE_BASE_TABLES);

    const current = this.db.prepare<[], VersionRow>("SELECT MAX(version) as version FROM schema_version").get();
    const currentVersion = current?.version ?? 0;
    if (currentVersion >= SCHEMA_VERSION) {
      return;
    }

    const tx = this.db.transaction(() => {
      for (let version = currentVersion + 1; version <= SCHEMA_VERSION; version++) {
        this.db
          .prepare("INSERT INTO schema_version(version, applied_at) VALUES (?, ?)")
          .run(version, new Date().toISOString());
      }
    });

    tx();
  }

  schemaVersion(): number {
    return this.db.prepare<[], VersionRow>("SELECT MAX(version) as version FROM schema_version").get()?.version ?? 0;
  }

  close(): void {
    this.db.close();
  }

  getKV(key: string): string | null {
    const row = this.db.prepare<[string], KvRow>("SELECT value FROM kv WHERE key = ?").get(key);
    return row?.value ?? null;
  }

  setKV(key: string, value: string): void {
    this.db
      .prepare(
        `INSERT INTO kv(key, value, updated_at)
         VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
      )
      .run(key, value, new Date().toISOString());
  }

  /** Parsed but unvalidated; callers check the shape. */
  getJsonKV(key: string): unknown {
    const value = this.getKV(key);
    if (!value) return null;
    const parsed: unknown = JSON.parse(value);
    return parsed;
  }

  setJsonKV(key: string, value: unknown): void {
    this.setKV(key, stringifyJson(value));
  }

  // -------------------------------------------------------------------------
  // Journal

  /**
   * Writes the transaction and its events in one SQLite transaction. Only
   * committed ledger transactions are journaled; rejected ones go to the audit.
   */
  appendTransaction(input: AppendTransactionInput): JournaledTransaction {
    const id = input.id ?? nextId();
    const committedAt = new Date().toISOString();
    const params = stringifyJson(input.params);
    const events = stringifyJson(input.events);

    const insertTx = this.db.prepare(
      `INSERT INTO transactions(id, timestamp, caller, method, params, events, committed_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    );
    const insertEvent = this.db.prepare(
      `INSERT INTO events(id, tx_seq, log_index, registry, type, agent_id, timestamp, payload)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    );

    const write = this.db.transaction((): number => {
      const result = insertTx.run(id, input.timestamp, input.caller, input.method, params, events, committedAt);
      const seq = Number(result.lastInsertRowid);
      input.events.forEach((event, logIndex) => {
        insertEvent.run(
          nextId(),
          seq,
          logIndex,
          event.registry,
          event.type,
          "agentId" in event ? event.agentId : null,
          input.timestamp,
          stringifyJson(event),
        );
      });
      return seq;
    });

    const seq = write();
    const storedParams: unknown = JSON.parse(params);
    return {
      seq,
      id,
      timestamp: input.timestamp,
      caller: input.caller,
      method: input.method,
      params: storedParams,
      events,
      committedAt,
    };
  }

  transactionCount(): number {
    return this.db.prepare<[], CountRow>("SELECT COUNT(*) as count FROM transactions").get()?.count ?? 0;
  }

  getTransaction(id: string): JournaledTransaction | null {
    const row = this.db
      .prepare<[string], TransactionRow>(`SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE id = ?`)
      .get(id);
    return row ? toTransaction(row) : null;
  }

  listTransactions(options: { afterSeq?: number; limit?: number; caller?: HexAddress } = {}): JournaledTransaction[] {
    const clauses = ["seq > ?"];
    const args: Array<string | number> = [options.afterSeq ?? 0];
    if (options.caller) {
      clauses.push("caller = ?");
      args.push(options.caller);
    }
    args.push(options.limit ?? 100);

    return this.db
      .prepare<Array<string | number>, TransactionRow>(
        `SELECT ${TRANSACTION_COLUMNS}
         FROM transactions
         WHERE ${clauses.join(" AND ")}
         ORDER BY seq ASC
         LIMIT ?`,
      )
      .all(...args)
      .map(toTransaction);
  }

  /** Every journaled transaction in commit order, read a page at a time. */
  *iterateTransactions(pageSize = 500): Generator<JournaledTransaction> {
    let afterSeq = 0;
    for (;;) {
      const page = this.listTransactions({ afterSeq, limit: pageSize });
      for (const tx of page) {
        afterSeq = tx.seq;
        yield tx;
      }
      if (page.length < pageSize) {
        return;
      }
    }
  }

  listEvents(query: EventQuery = {}): JournaledEvent[] {
    const clauses = ["tx_seq > ?"];
    const args: Array<string | number> = [query.afterSeq ?? 0];
    if (query.registry) {
      clauses.push("registry = ?");
      args.push(query.registry);
    }
    if (query.agentId !== undefined) {
      clauses.push("agent_id = ?");
      args.push(query.agentId);
    }
    if (query.type) {
      clauses.push("type = ?");
      args.push(query.type);
    }
    args.push(query.limit ?? 100);

    return this.db
      .prepare<Array<string | number>, EventRow>(
        `SELECT ${EVENT_COLUMNS}
         FROM events
         WHERE ${clauses.join(" AND ")}
         ORDER BY tx_seq ASC, log_index ASC
         LIMIT ?`,
      )
      .all(...args)
      .map((row) => ({ ...row, payload: parseJsonRecord(row.payload) }));
  }

  // -------------------------------------------------------------------------
  // Audit

  insertAudit(entry: Omit<AuditEntry, "id" | "timestamp"> & { id?: string; timestamp?: string }): string {
    const id = entry.id ?? nextId();
    this.db
      .prepare(
        `INSERT INTO audit_entries(id, timestamp, category, action, details)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(id, entry.timestamp ?? new Date().toISOString(), entry.category, entry.action, entry.details);
    return id;
  }

  listAudit(limit = 50, category?: string): AuditEntry[] {
    if (category) {
      return this.db
        .prepare<[string, number], AuditEntry>(
          `SELECT id, timestamp, category, action, details
           FROM audit_entries
           WHERE category = ?
           ORDER BY id DESC
           LIMIT ?`,
        )
        .all(category, limit);
    }
    return this.db
      .prepare<[number], AuditEntry>(
        `SELECT id, timestamp, category, action, details
         FROM audit_entries
         ORDER BY id DESC
         LIMIT ?`,
      )
      .all(limit);
  }

  // -------------------------------------------------------------------------
  // Signed request replay protection

  hasReplayFingerprint(fingerprint: string, nowIso = new Date().toISOString()): boolean {
    const row = this.db
      .prepare<[string, string], CountRow>(
        `SELECT COUNT(*) as count
         FROM request_replay
         WHERE request_fingerprint = ? AND expires_at > ?`,
      )
      .get(fingerprint, nowIso);
    return (row?.count ?? 0) > 0;
  }

  recordReplayFingerprint(fingerprint: string, expiresAt: string): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO request_replay(request_fingerprint, created_at, expires_at)
         VALUES (?, ?, ?)`,
      )
      .run(fingerprint, new Date().toISOString(), expiresAt);
  }

  cleanupReplayFingerprints(nowIso = new Date().toISOString()): void {
    this.db.prepare("DELETE FROM request_replay WHERE expires_at <= ?").run(nowIso);
  }
}

function toTransaction(row: TransactionRow): JournaledTransaction {
  const params: unknown = JSON.parse(row.params);
  return { ...row, params };
}
