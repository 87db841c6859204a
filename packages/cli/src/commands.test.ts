import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { generatePrivateKey, privateKeyToAccount } from "viem/accounts";
import { HELP, runCommand } from "./commands.js";

describe("cli commands", () => {
  const ownerKey = generatePrivateKey();
  const walletKey = generatePrivateKey();
  const owner = privateKeyToAccount(ownerKey);
  const wallet = privateKeyToAccount(walletKey);
  let home: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), "trustledger-cli-"));
  });

  afterEach(() => {
    fs.rmSync(home, { recursive: true, force: true });
  });

  const as = (key?: string) => ({ env: { TRUSTLEDGER_HOME: home, TRUSTLEDGER_PRIVATE_KEY: key } });

  it("initializes a ledger home", async () => {
    const result = await runCommand(["init"], as());

    expect(result).toMatchObject({ ok: true, command: "init", replay: { transactions: 0, lastSeq: 0 } });
    expect(fs.existsSync(path.join(home, "config.json"))).toBe(true);
    expect(fs.existsSync(path.join(home, "data", "ledger.db"))).toBe(true);
  });

  it("keeps committed transactions across invocations", async () => {
    const receipt = await runCommand(["tx", "identity.register", "--params", '{"uri":"ipfs://cli"}'], as(ownerKey));
    expect(receipt).toMatchObject({ seq: 1, method: "identity.register", caller: owner.address, result: 1 });

    const agent = await runCommand(["agent", "1"], as());
    expect(agent).toMatchObject({ agentId: 1, owner: owner.address, uri: "ipfs://cli" });

    const events = await runCommand(["events", "--registry", "identity"], as());
    expect(Array.isArray(events) && events.length).toBe(2);
  });

  it("signs a delegation the owner can submit", async () => {
    await runCommand(["tx", "identity.register"], as(ownerKey));

    const proof = await runCommand(["sign-delegation", "--agent-id", "1"], as(walletKey));
    expect(proof).toMatchObject({ agentId: 1, wallet: wallet.address });

    await runCommand(["tx", "identity.setAgentWallet", "--params", JSON.stringify(proof)], as(ownerKey));
    expect(await runCommand(["agent", "1"], as())).toMatchObject({ agentWallet: wallet.address, walletNonce: 1 });
  });

  it("lists the ledger methods", async () => {
    const methods = await runCommand(["methods"], as());
    expect(Array.isArray(methods) && methods.length).toBe(21);
    expect(Array.isArray(methods) && methods.slice(0, 2)).toEqual(["identity.register", "identity.setAgentURI"]);
  });

  it("reports usage errors", async () => {
    await expect(runCommand(["launch"], as())).rejects.toThrowError("Unknown command: launch");
    await expect(runCommand(["agent", "abc"], as())).rejects.toThrowError("agentId must be a non-negative integer, got abc");
    await expect(runCommand(["tx", "identity.register"], as())).rejects.toThrowError("TRUSTLEDGER_PRIVATE_KEY is not set");
    await expect(runCommand(["tx", "identity.register", "--params", "{uri"], as(ownerKey))).rejects.toThrowError(
      /^--params must be JSON/,
    );
    await expect(runCommand(["events", "--registry", "ledger"], as())).rejects.toThrowError(
      "--registry must be one of identity, reputation, validation, incident",
    );
    await expect(runCommand([], as())).resolves.toBe(HELP);
  });
});
