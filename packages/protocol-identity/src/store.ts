import type { Bytes32, HexAddress, HexBytes } from "@trustledger/shared-types";

export interface AgentRecord {
  agentId: number;
  owner: HexAddress;
  uri: string;
  uriHash: Bytes32 | null;
  metadata: Map<string, HexBytes>;
  agentWallet: HexAddress | null;
  approved: HexAddress | null;
  active: boolean;
  walletNonce: number;
  createdAt: number;
  updatedAt: number;
}

export interface IdentityStore {
  agents: Map<number, AgentRecord>;
  /** Next id to mint; ids start at 1 and are never reused. */
  nextAgentId: number;
  /** owner -> operators approved for all of the owner's agents */
  operators: Map<HexAddress, Set<HexAddress>>;
  /** owner -> agent ids, in acquisition order */
  holdings: Map<HexAddress, number[]>;
}

export function createIdentityStore(): IdentityStore {
  return {
    agents: new Map(),
    nextAgentId: 1,
    operators: new Map(),
    holdings: new Map(),
  };
}
