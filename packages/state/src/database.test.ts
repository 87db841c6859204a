import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { HexAddress, LedgerEvent } from "@trustledger/shared-types";
import { LedgerDatabase, SCHEMA_VERSION, stringifyJson, toJsonSafe } from "./index.js";

const CALLER: HexAddress = "0x1111111111111111111111111111111111111111";

const REGISTERED: LedgerEvent = {
  registry: "identity",
  type: "Registered",
  agentId: 1,
  owner: CALLER,
  uri: "ipfs://agent",
};

describe("LedgerDatabase", () => {
  let db: LedgerDatabase;

  beforeEach(() => {
    db = new LedgerDatabase({ dbPath: ":memory:" });
    db.runMigrations();
  });

  afterEach(() => {
    db.close();
  });

  it("migrates once", () => {
    db.runMigrations();
    expect(db.schemaVersion()).toBe(SCHEMA_VERSION);
  });

  it("stores key/value pairs", () => {
    expect(db.getKV("missing")).toBeNull();
    db.setKV("name", "ledger");
    db.setKV("name", "ledger-2");
    expect(db.getKV("name")).toBe("ledger-2");

    db.setJsonKV("domain", { chainId: 31337 });
    expect(db.getJsonKV("domain")).toEqual({ chainId: 31337 });
  });

  it("journals transactions with their events", () => {
    const tx = db.appendTransaction({
      timestamp: 1_700_000_000,
      caller: CALLER,
      method: "identity.register",
      params: { uri: "ipfs://agent" },
      events: [REGISTERED],
    });

    expect(tx.seq).toBe(1);
    expect(tx.params).toEqual({ uri: "ipfs://agent" });
    expect(db.transactionCount()).toBe(1);
    expect(db.getTransaction(tx.id)).toEqual(tx);

    expect(db.listEvents({ registry: "identity", agentId: 1 })).toEqual([
      {
        id: expect.any(String),
        txSeq: 1,
        logIndex: 0,
        registry: "identity",
        type: "Registered",
        agentId: 1,
        timestamp: 1_700_000_000,
        payload: { registry: "identity", type: "Registered", agentId: 1, owner: CALLER, uri: "ipfs://agent" },
      },
    ]);
    expect(db.listEvents({ registry: "reputation" })).toEqual([]);
  });

  it("pages through transactions in commit order", () => {
    for (let i = 0; i < 5; i++) {
      db.appendTransaction({ timestamp: i, caller: CALLER, method: `m${i}`, params: {}, events: [] });
    }

    expect([...db.iterateTransactions(2)].map((tx) => tx.method)).toEqual(["m0", "m1", "m2", "m3", "m4"]);
    expect(db.listTransactions({ afterSeq: 3 }).map((tx) => tx.seq)).toEqual([4, 5]);
  });

  it("serialises bigint values as decimal strings", () => {
    const tx = db.appendTransaction({
      timestamp: 1,
      caller: CALLER,
      method: "reputation.giveFeedback",
      params: { score: { value: 12n, decimals: 1 } },
      events: [],
    });
    expect(tx.params).toEqual({ score: { value: "12", decimals: 1 } });
    expect(stringifyJson({ big: 2n ** 70n })).toBe('{"big":"1180591620717411303424"}');
    expect(toJsonSafe([1n, "x"])).toEqual(["1", "x"]);
  });

  it("keeps audit entries newest first", () => {
    db.insertAudit({ category: "tx", action: "rejected", details: "NOT_OWNER" });
    db.insertAudit({ category: "replay", action: "completed", details: null });

    expect(db.listAudit().map((entry) => entry.action)).toEqual(["completed", "rejected"]);
    expect(db.listAudit(10, "tx")).toEqual([
      { id: expect.any(String), timestamp: expect.any(String), category: "tx", action: "rejected", details: "NOT_OWNER" },
    ]);
  });

  it("tracks replay fingerprints until they expire", () => {
    db.recordReplayFingerprint("abc", "2030-01-01T00:00:00.000Z");
    expect(db.hasReplayFingerprint("abc", "2029-12-31T00:00:00.000Z")).toBe(true);
    expect(db.hasReplayFingerprint("abc", "2030-01-02T00:00:00.000Z")).toBe(false);

    db.cleanupReplayFingerprints("2030-01-02T00:00:00.000Z");
    expect(db.hasReplayFingerprint("abc", "2029-12-31T00:00:00.000Z")).toBe(false);
  });
});
