import { beforeEach, describe, expect, it } from "vitest";
import { generatePrivateKey, privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import { toHex } from "viem";
import { RecordingEventSink, ZERO_ADDRESS } from "@trustledger/protocol-kernel";
import type { DelegationProof, ExecutionDomain, HexAddress, TxContext } from "@trustledger/shared-types";
import {
  Eip712DelegationVerifier,
  IdentityRegistry,
  delegationTypedData,
  isCanonicalSignature,
  type AgentReceiver,
} from "./index.js";

const DOMAIN: ExecutionDomain = {
  chainId: 31337,
  identityRegistry: "0x0000000000000000000000000000000000008001",
  reputationRegistry: "0x0000000000000000000000000000000000008002",
  validationRegistry: "0x0000000000000000000000000000000000008003",
  incidentRegistry: "0x0000000000000000000000000000000000008004",
};

const OWNER: HexAddress = "0x1111111111111111111111111111111111111111";
const BUYER: HexAddress = "0x4444444444444444444444444444444444444444";
const STRANGER: HexAddress = "0x5555555555555555555555555555555555555555";
const NOW = 1_700_000_000;

function ctx(caller: HexAddress, timestamp = NOW): TxContext {
  return { caller, timestamp };
}

describe("IdentityRegistry", () => {
  let events: RecordingEventSink;
  let registry: IdentityRegistry;
  let wallet: PrivateKeyAccount;

  async function signDelegation(
    agentId: number,
    signer: PrivateKeyAccount,
    deadline = NOW + 60,
    claimedWallet: HexAddress = signer.address,
  ): Promise<DelegationProof> {
    const message = registry.delegationMessage(agentId, claimedWallet, deadline);
    const signature = await signer.signTypedData(delegationTypedData(DOMAIN, message));
    return { wallet: claimedWallet, deadline, signature };
  }

  beforeEach(() => {
    events = new RecordingEventSink();
    registry = new IdentityRegistry({ verifier: new Eip712DelegationVerifier(DOMAIN), events });
    wallet = privateKeyToAccount(generatePrivateKey());
  });

  describe("register", () => {
    it("assigns sequential ids starting at 1", () => {
      expect(registry.register(ctx(OWNER))).toBe(1);
      expect(registry.register(ctx(OWNER), "ipfs://agent-2")).toBe(2);
      expect(registry.totalAgents()).toBe(2);
      expect(registry.agentsOf(OWNER)).toEqual([1, 2]);
      expect(registry.agentURI(2)).toBe("ipfs://agent-2");
    });

    it("stores metadata and emits one notification per entry", () => {
      const agentId = registry.register(ctx(OWNER), "ipfs://agent", [
        { key: "name", value: toHex("Scout") },
        { key: "version", value: toHex("1") },
      ]);

      expect(registry.getMetadata(agentId, "name")).toBe(toHex("Scout"));
      expect(registry.getMetadata(agentId, "missing")).toBeNull();
      expect(events.list().map((event) => event.type)).toEqual([
        "Transfer",
        "Registered",
        "MetadataSet",
        "MetadataSet",
      ]);
    });

    it("rejects the reserved wallet key without minting", () => {
      expect(() => registry.register(ctx(OWNER), "ipfs://agent", [{ key: "agentWallet", value: "0x01" }])).toThrowError(
        /^RESERVED_METADATA_KEY/,
      );
      expect(registry.totalAgents()).toBe(0);
      expect(events.list()).toEqual([]);
    });

    it("rejects oversized URIs", () => {
      expect(() => registry.register(ctx(OWNER), "u".repeat(2049))).toThrowError(/^STRING_TOO_LONG/);
      expect(registry.register(ctx(OWNER), "u".repeat(2048))).toBe(1);
    });
  });

  describe("owner-managed fields", () => {
    it("lets only the owner or an operator update the URI", () => {
      const agentId = registry.register(ctx(OWNER), "ipfs://v1");
      expect(() => registry.setAgentURI(ctx(STRANGER), agentId, "ipfs://evil")).toThrowError(/^NOT_AUTHORIZED/);

      registry.setApprovalForAll(ctx(OWNER), STRANGER, true);
      registry.setAgentURI(ctx(STRANGER), agentId, "ipfs://v2", `0x${"cd".repeat(32)}`);
      expect(registry.getAgent(agentId).uri).toBe("ipfs://v2");
      expect(registry.getAgent(agentId).uriHash).toBe(`0x${"cd".repeat(32)}`);
    });

    it("does not let setMetadata touch the wallet key", () => {
      const agentId = registry.register(ctx(OWNER));
      expect(() => registry.setMetadata(ctx(OWNER), agentId, "agentWallet", "0x1234")).toThrowError(
        /^RESERVED_METADATA_KEY/,
      );
    });

    it("enforces deactivation idempotency", () => {
      const agentId = registry.register(ctx(OWNER));
      expect(() => registry.reactivate(ctx(OWNER), agentId)).toThrowError(/^ALREADY_ACTIVE/);

      registry.deactivate(ctx(OWNER), agentId);
      expect(registry.isActive(agentId)).toBe(false);
      expect(() => registry.deactivate(ctx(OWNER), agentId)).toThrowError(/^ALREADY_INACTIVE/);

      registry.reactivate(ctx(OWNER), agentId);
      expect(registry.isActive(agentId)).toBe(true);
    });

    it("keeps deactivation owner-only even for operators", () => {
      const agentId = registry.register(ctx(OWNER));
      registry.setApprovalForAll(ctx(OWNER), STRANGER, true);
      expect(() => registry.deactivate(ctx(STRANGER), agentId)).toThrowError(/^NOT_AUTHORIZED/);
    });

    it("rejects operations on unknown agents", () => {
      expect(() => registry.ownerOf(7)).toThrowError(/^AGENT_NOT_FOUND: agent 7 does not exist$/);
      expect(registry.agentExists(7)).toBe(false);
      expect(() => registry.setMetadata(ctx(OWNER), 7, "k", "0x00")).toThrowError(/^AGENT_NOT_FOUND/);
    });
  });

  describe("delegated wallet", () => {
    it("accepts a proof signed by the wallet and bumps the nonce", async () => {
      const agentId = registry.register(ctx(OWNER));
      await registry.setAgentWallet(ctx(OWNER), agentId, await signDelegation(agentId, wallet));

      expect(registry.getAgentWallet(agentId)).toBe(wallet.address);
      expect(registry.getMetadata(agentId, "agentWallet")).toBe(wallet.address);
      expect(registry.walletNonce(agentId)).toBe(1);
      expect(events.list().at(-1)).toEqual({
        registry: "identity",
        type: "AgentWalletSet",
        agentId,
        wallet: wallet.address,
        setBy: OWNER,
        nonce: 0,
      });
    });

    it("rejects a proof signed by someone other than the wallet", async () => {
      const agentId = registry.register(ctx(OWNER));
      const impostor = privateKeyToAccount(generatePrivateKey());
      const proof = await signDelegation(agentId, impostor, NOW + 60, wallet.address);

      await expect(registry.setAgentWallet(ctx(OWNER), agentId, proof)).rejects.toThrowError(/^INVALID_SIGNATURE/);
      expect(registry.getAgentWallet(agentId)).toBe(ZERO_ADDRESS);
    });

    it("rejects an expired proof", async () => {
      const agentId = registry.register(ctx(OWNER));
      const proof = await signDelegation(agentId, wallet, NOW - 1);
      await expect(registry.setAgentWallet(ctx(OWNER), agentId, proof)).rejects.toThrowError(/^SIGNATURE_EXPIRED/);
    });

    it("rejects deadlines beyond the allowed window", async () => {
      const agentId = registry.register(ctx(OWNER));
      const proof = await signDelegation(agentId, wallet, NOW + 301);
      await expect(registry.setAgentWallet(ctx(OWNER), agentId, proof)).rejects.toThrowError(/^DEADLINE_TOO_FAR/);
    });

    it("refuses to replay a consumed proof", async () => {
      const agentId = registry.register(ctx(OWNER));
      const proof = await signDelegation(agentId, wallet);
      await registry.setAgentWallet(ctx(OWNER), agentId, proof);
      registry.unsetAgentWallet(ctx(OWNER), agentId);

      await expect(registry.setAgentWallet(ctx(OWNER), agentId, proof)).rejects.toThrowError(/^INVALID_SIGNATURE/);
      expect(registry.agentWalletOf(agentId)).toBeNull();
    });

    it("requires manager rights to delegate", async () => {
      const agentId = registry.register(ctx(OWNER));
      const proof = await signDelegation(agentId, wallet);
      await expect(registry.setAgentWallet(ctx(STRANGER), agentId, proof)).rejects.toThrowError(/^NOT_AUTHORIZED/);
    });

    it("fails to unset when nothing is delegated", () => {
      const agentId = registry.register(ctx(OWNER));
      expect(() => registry.unsetAgentWallet(ctx(OWNER), agentId)).toThrowError(/^WALLET_NOT_SET/);
    });

    it("rejects high-s and truncated signatures", () => {
      const highS = `0x${"11".repeat(32)}${"ff".repeat(32)}1b`;
      expect(isCanonicalSignature(highS)).toBe(false);
      expect(isCanonicalSignature(`0x${"11".repeat(64)}`)).toBe(false);
      expect(isCanonicalSignature(`0x${"11".repeat(32)}${"22".repeat(32)}1c`)).toBe(true);
    });

    it("rejects a well-formed signature that recovers no key", async () => {
      const agentId = registry.register(ctx(OWNER));
      const zeroR = `0x${"00".repeat(32)}${"22".repeat(32)}1b` as const;
      expect(isCanonicalSignature(zeroR)).toBe(true);

      await expect(
        registry.setAgentWallet(ctx(OWNER), agentId, { wallet: wallet.address, deadline: NOW + 60, signature: zeroR }),
      ).rejects.toThrowError(/^INVALID_SIGNATURE/);
      expect(registry.agentWalletOf(agentId)).toBeNull();
    });

    it("re-checks the caller's rights once the proof is verified", async () => {
      let release: (valid: boolean) => void = () => undefined;
      const deferred = new IdentityRegistry({
        verifier: { verify: () => new Promise<boolean>((resolve) => (release = resolve)) },
        events,
      });
      const agentId = deferred.register(ctx(OWNER));
      deferred.approve(ctx(OWNER), STRANGER, agentId);

      const pending = deferred.setAgentWallet(ctx(STRANGER), agentId, {
        wallet: wallet.address,
        deadline: NOW + 60,
        signature: `0x${"11".repeat(65)}`,
      });
      deferred.approve(ctx(OWNER), null, agentId);
      events.drain();
      release(true);

      await expect(pending).rejects.toThrowError(/^NOT_AUTHORIZED/);
      expect(deferred.agentWalletOf(agentId)).toBeNull();
      expect(deferred.walletNonce(agentId)).toBe(0);
      expect(events.list()).toEqual([]);
    });
  });

  describe("transfer", () => {
    it("clears the delegated wallet and approval on transfer", async () => {
      const agentId = registry.register(ctx(OWNER));
      await registry.setAgentWallet(ctx(OWNER), agentId, await signDelegation(agentId, wallet));
      registry.approve(ctx(OWNER), STRANGER, agentId);
      events.drain();

      registry.transferFrom(ctx(OWNER), OWNER, BUYER, agentId);

      expect(registry.ownerOf(agentId)).toBe(BUYER);
      expect(registry.getAgentWallet(agentId)).toBe(ZERO_ADDRESS);
      expect(registry.getApproved(agentId)).toBeNull();
      expect(registry.agentsOf(OWNER)).toEqual([]);
      expect(registry.agentsOf(BUYER)).toEqual([agentId]);
      expect(events.list()).toEqual([
        { registry: "identity", type: "Transfer", from: OWNER, to: BUYER, agentId },
        {
          registry: "identity",
          type: "AgentWalletCleared",
          agentId,
          previousWallet: wallet.address,
          reason: "transfer",
        },
      ]);
    });

    it("lets a single-agent approval transfer", () => {
      const agentId = registry.register(ctx(OWNER));
      registry.approve(ctx(OWNER), STRANGER, agentId);
      registry.transferFrom(ctx(STRANGER), OWNER, BUYER, agentId);
      expect(registry.ownerOf(agentId)).toBe(BUYER);
    });

    it("rejects a mismatched from address and the zero recipient", () => {
      const agentId = registry.register(ctx(OWNER));
      expect(() => registry.transferFrom(ctx(OWNER), STRANGER, BUYER, agentId)).toThrowError(/^NOT_OWNER/);
      expect(() => registry.transferFrom(ctx(OWNER), OWNER, ZERO_ADDRESS, agentId)).toThrowError(/^ZERO_ADDRESS/);
      expect(() => registry.transferFrom(ctx(STRANGER), OWNER, BUYER, agentId)).toThrowError(/^NOT_AUTHORIZED/);
    });

    it("aborts a safe transfer the recipient does not acknowledge", () => {
      const refusing: AgentReceiver = { onAgentReceived: () => false };
      const guarded = new IdentityRegistry({
        verifier: new Eip712DelegationVerifier(DOMAIN),
        events,
        recipients: { receiverFor: (address) => (address === BUYER ? refusing : undefined) },
      });
      const agentId = guarded.register(ctx(OWNER));
      events.drain();

      expect(() => guarded.safeTransferFrom(ctx(OWNER), OWNER, BUYER, agentId)).toThrowError(/^TRANSFER_REJECTED/);
      expect(guarded.ownerOf(agentId)).toBe(OWNER);
      expect(events.list()).toEqual([]);

      guarded.safeTransferFrom(ctx(OWNER), OWNER, STRANGER, agentId, "0xbeef");
      expect(guarded.ownerOf(agentId)).toBe(STRANGER);
    });

    it("validates transfer data even without a registered receiver", () => {
      const agentId = registry.register(ctx(OWNER));
      expect(() => registry.safeTransferFrom(ctx(OWNER), OWNER, BUYER, agentId, "0xzz")).toThrowError(
        "INVALID_ARGUMENT: data must be 0x-prefixed hex",
      );
      expect(registry.ownerOf(agentId)).toBe(OWNER);
    });

    it("invalidates proofs signed for the previous owner", async () => {
      const agentId = registry.register(ctx(OWNER));
      const proof = await signDelegation(agentId, wallet);
      registry.transferFrom(ctx(OWNER), OWNER, BUYER, agentId);

      await expect(registry.setAgentWallet(ctx(BUYER), agentId, proof)).rejects.toThrowError(/^INVALID_SIGNATURE/);
    });
  });
});
