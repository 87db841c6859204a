import type { Bytes32, HexAddress, ValidationStatus } from "@trustledger/shared-types";

export interface ValidationRecord {
  requestId: Bytes32;
  requester: HexAddress;
  validator: HexAddress;
  agentId: number;
  contentHash: Bytes32;
  requestURI: string;
  nonce: number;
  status: ValidationStatus;
  response: number | null;
  responseDefaulted: boolean;
  responseURI: string;
  responseHash: Bytes32 | null;
  tag: string;
  createdAt: number;
  completedAt: number | null;
}

export interface ValidationStore {
  requests: Map<Bytes32, ValidationRecord>;
  byAgent: Map<number, Bytes32[]>;
  byValidator: Map<HexAddress, Bytes32[]>;
  byRequester: Map<HexAddress, Bytes32[]>;
  /** requester -> next sequence number; only ever increases */
  nonces: Map<HexAddress, number>;
}

export function createValidationStore(): ValidationStore {
  return {
    requests: new Map(),
    byAgent: new Map(),
    byValidator: new Map(),
    byRequester: new Map(),
    nonces: new Map(),
  };
}
