import { beforeEach, describe, expect, it } from "vitest";
import { RecordingEventSink, RegistryError, type AgentAuthority } from "@trustledger/protocol-kernel";
import type { Bytes32, HexAddress, TxContext } from "@trustledger/shared-types";
import {
  ValidationRegistry,
  createValidationStore,
  defaultContentHash,
  deriveRequestId,
  type ValidationRecord,
} from "./index.js";

const OWNER: HexAddress = "0x1111111111111111111111111111111111111111";
const REQUESTER: HexAddress = "0x3333333333333333333333333333333333333333";
const VALIDATOR: HexAddress = "0x7777777777777777777777777777777777777777";
const OTHER_VALIDATOR: HexAddress = "0x8888888888888888888888888888888888888888";
const REGISTRY: HexAddress = "0x0000000000000000000000000000000000008003";
const CONTENT: Bytes32 = `0x${"ab".repeat(32)}`;
const CHAIN_ID = 31337;
const NOW = 1_700_000_000;

class FakeAuthority implements AgentAuthority {
  readonly owners = new Map<number, HexAddress>();

  agentExists(agentId: number): boolean {
    return this.owners.has(agentId);
  }

  ownerOf(agentId: number): HexAddress {
    const owner = this.owners.get(agentId);
    if (!owner) {
      throw new RegistryError("AGENT_NOT_FOUND", `agent ${agentId} does not exist`);
    }
    return owner;
  }

  agentWalletOf(): HexAddress | null {
    return null;
  }
}

function ctx(caller: HexAddress, timestamp = NOW): TxContext {
  return { caller, timestamp };
}

describe("ValidationRegistry", () => {
  let events: RecordingEventSink;
  let registry: ValidationRegistry;

  beforeEach(() => {
    const authority = new FakeAuthority();
    authority.owners.set(1, OWNER);
    events = new RecordingEventSink();
    registry = new ValidationRegistry({ authority, chainId: CHAIN_ID, registryAddress: REGISTRY, events });
  });

  function request(contentHash: Bytes32 | undefined = CONTENT, validator = VALIDATOR): Bytes32 {
    return registry.requestValidation(ctx(REQUESTER), { validator, agentId: 1, requestURI: "ipfs://job", contentHash });
  }

  describe("requestValidation", () => {
    it("refuses to overwrite a record under a colliding id", () => {
      const authority = new FakeAuthority();
      authority.owners.set(1, OWNER);
      const store = createValidationStore();
      const collidingId = deriveRequestId({
        requester: REQUESTER,
        validator: VALIDATOR,
        agentId: 1,
        contentHash: CONTENT,
        nonce: 0,
        chainId: CHAIN_ID,
        registry: REGISTRY,
      });
      const existing: ValidationRecord = {
        requestId: collidingId,
        requester: OWNER,
        validator: OTHER_VALIDATOR,
        agentId: 1,
        contentHash: CONTENT,
        requestURI: "ipfs://earlier",
        nonce: 7,
        status: "completed",
        response: 42,
        responseDefaulted: false,
        responseURI: "",
        responseHash: null,
        tag: "",
        createdAt: NOW - 10,
        completedAt: NOW - 5,
      };
      store.requests.set(collidingId, existing);
      const before = { ...existing };
      const guarded = new ValidationRegistry({ authority, chainId: CHAIN_ID, registryAddress: REGISTRY, store, events });

      let thrown: unknown;
      try {
        guarded.requestValidation(ctx(REQUESTER), {
          validator: VALIDATOR,
          agentId: 1,
          requestURI: "ipfs://job",
          contentHash: CONTENT,
        });
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(RegistryError);
      expect(thrown).toMatchObject({ code: "ID_COLLISION", kind: "integrity" });
      expect(store.requests.get(collidingId)).toEqual(before);
      expect(guarded.requesterNonce(REQUESTER)).toBe(0);
      expect(guarded.getRequesterRequests(REQUESTER)).toEqual([]);
      expect(events.list()).toEqual([]);
    });

    it("derives ids from the requester nonce and the execution domain", () => {
      const first = request();
      const second = request();

      expect(first).not.toBe(second);
      expect(first).toBe(
        deriveRequestId({
          requester: REQUESTER,
          validator: VALIDATOR,
          agentId: 1,
          contentHash: CONTENT,
          nonce: 0,
          chainId: CHAIN_ID,
          registry: REGISTRY,
        }),
      );
      expect(registry.getRequest(second).nonce).toBe(1);
      expect(registry.requesterNonce(REQUESTER)).toBe(2);
    });

    it("changes the id when the domain changes", () => {
      const other = new ValidationRegistry({
        authority: { agentExists: () => true, ownerOf: () => OWNER, agentWalletOf: () => null },
        chainId: CHAIN_ID + 1,
        registryAddress: REGISTRY,
      });
      const id = other.requestValidation(ctx(REQUESTER), {
        validator: VALIDATOR,
        agentId: 1,
        requestURI: "ipfs://job",
        contentHash: CONTENT,
      });
      expect(id).not.toBe(request());
    });

    it("hashes the request when no content hash is supplied", () => {
      const id = request(undefined);
      expect(registry.getRequest(id).contentHash).toBe(defaultContentHash(REQUESTER, VALIDATOR, 1, "ipfs://job"));
    });

    it("emits the pending request", () => {
      const id = request();
      expect(events.list()).toEqual([
        {
          registry: "validation",
          type: "ValidationRequested",
          requestId: id,
          requester: REQUESTER,
          validator: VALIDATOR,
          agentId: 1,
          requestURI: "ipfs://job",
          contentHash: CONTENT,
          nonce: 0,
          createdAt: NOW,
        },
      ]);
    });

    it("rejects unknown agents and a zero validator without consuming a nonce", () => {
      expect(() =>
        registry.requestValidation(ctx(REQUESTER), { validator: VALIDATOR, agentId: 5, requestURI: "x" }),
      ).toThrowError(/^AGENT_NOT_FOUND/);
      expect(() =>
        registry.requestValidation(ctx(REQUESTER), {
          validator: "0x0000000000000000000000000000000000000000",
          agentId: 1,
          requestURI: "x",
        }),
      ).toThrowError(/^ZERO_ADDRESS/);
      expect(registry.requesterNonce(REQUESTER)).toBe(0);
      expect(events.list()).toEqual([]);
    });
  });

  describe("decisions", () => {
    it("completes and rejects with named defaults", () => {
      const first = request();
      const second = request();

      registry.completeValidation(ctx(VALIDATOR, NOW + 60), first);
      registry.rejectValidation(ctx(VALIDATOR, NOW + 90), second);

      expect(registry.getRequest(first)).toMatchObject({
        status: "completed",
        response: 100,
        responseDefaulted: true,
        completedAt: NOW + 60,
      });
      expect(registry.getRequest(second)).toMatchObject({
        status: "rejected",
        response: 0,
        responseDefaulted: true,
      });
      expect(registry.getSummary(1)).toEqual({
        agentId: 1,
        total: 2,
        pending: 0,
        completed: 1,
        rejected: 1,
        cancelled: 0,
        averageResponse: 50,
      });
    });

    it("records explicit outcomes", () => {
      const id = request();
      registry.completeValidation(ctx(VALIDATOR, NOW + 5), id, {
        response: 87,
        responseURI: "ipfs://report",
        responseHash: `0x${"CD".repeat(32)}`,
        tag: "audit",
      });

      expect(events.drain().at(-1)).toEqual({
        registry: "validation",
        type: "ValidationCompleted",
        requestId: id,
        validator: VALIDATOR,
        agentId: 1,
        status: "completed",
        response: 87,
        responseDefaulted: false,
        responseURI: "ipfs://report",
        responseHash: `0x${"cd".repeat(32)}`,
        tag: "audit",
        completedAt: NOW + 5,
      });
      expect(registry.getStatus(id)).toEqual({
        requestId: id,
        status: "completed",
        validator: VALIDATOR,
        agentId: 1,
        response: 87,
        tag: "audit",
        lastUpdate: NOW + 5,
      });
    });

    it("accepts only the named validator", () => {
      const id = request();
      expect(() => registry.completeValidation(ctx(OTHER_VALIDATOR), id)).toThrowError(/^NOT_AUTHORIZED/);
      expect(() => registry.rejectValidation(ctx(REQUESTER), id)).toThrowError(/^NOT_AUTHORIZED/);
      expect(registry.getStatus(id).status).toBe("pending");
    });

    it("rejects out-of-range responses and repeat decisions", () => {
      const id = request();
      expect(() => registry.completeValidation(ctx(VALIDATOR), id, { response: 101 })).toThrowError(/^INVALID_ARGUMENT/);
      expect(() => registry.completeValidation(ctx(VALIDATOR), id, { response: 2.5 })).toThrowError(/^INVALID_ARGUMENT/);
      expect(() => registry.completeValidation(ctx(VALIDATOR), id, { tag: "t".repeat(129) })).toThrowError(
        /^STRING_TOO_LONG: tag/,
      );
      expect(registry.getStatus(id).status).toBe("pending");

      registry.completeValidation(ctx(VALIDATOR), id, { response: 40 });
      expect(() => registry.rejectValidation(ctx(VALIDATOR), id)).toThrowError(/^INVALID_STATUS/);
      expect(registry.getRequest(id).response).toBe(40);
    });

    it("reports unknown and malformed ids", () => {
      const missing: Bytes32 = `0x${"00".repeat(32)}`;
      expect(() => registry.completeValidation(ctx(VALIDATOR), missing)).toThrowError(/^REQUEST_NOT_FOUND/);
      expect(() => registry.getRequest("0x1234")).toThrowError(/^INVALID_HASH/);
      expect(registry.requestExists(missing)).toBe(false);
      expect(registry.requestExists("0x1234")).toBe(false);
    });
  });

  describe("cancelValidation", () => {
    it("lets the requester withdraw a pending request", () => {
      const id = request();
      expect(() => registry.cancelValidation(ctx(VALIDATOR), id)).toThrowError(/^NOT_AUTHORIZED/);

      registry.cancelValidation(ctx(REQUESTER, NOW + 30), id);
      expect(registry.getStatus(id)).toMatchObject({ status: "cancelled", response: null, lastUpdate: NOW + 30 });
      expect(() => registry.completeValidation(ctx(VALIDATOR), id)).toThrowError(/^INVALID_STATUS/);
      expect(() => registry.cancelValidation(ctx(REQUESTER), id)).toThrowError(/^INVALID_STATUS/);
    });
  });

  describe("queries", () => {
    it("indexes requests by agent, validator and requester", () => {
      const a = request();
      const b = request(CONTENT, OTHER_VALIDATOR);

      expect(registry.getAgentValidations(1)).toEqual([a, b]);
      expect(registry.getValidatorRequests(OTHER_VALIDATOR)).toEqual([b]);
      expect(registry.getRequesterRequests(REQUESTER)).toEqual([a, b]);
      expect(registry.getValidatorRequests(OWNER)).toEqual([]);
    });

    it("filters summaries by validator and tag", () => {
      const a = request();
      const b = request(CONTENT, OTHER_VALIDATOR);
      request();
      registry.completeValidation(ctx(VALIDATOR), a, { response: 91, tag: "audit" });
      registry.rejectValidation(ctx(OTHER_VALIDATOR), b, { response: 20, tag: "audit" });

      expect(registry.getSummary(1, { validators: [VALIDATOR] })).toMatchObject({
        total: 2,
        pending: 1,
        completed: 1,
        averageResponse: 91,
      });
      expect(registry.getSummary(1, { tag: "audit" })).toMatchObject({
        total: 2,
        completed: 1,
        rejected: 1,
        averageResponse: 55,
      });
      expect(registry.getSummary(1, { tag: "none-yet" })).toMatchObject({ total: 0, averageResponse: null });
    });
  });
});
