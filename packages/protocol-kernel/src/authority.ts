import type { HexAddress } from "@trustledger/shared-types";
import { sameAddress } from "./address.js";
import { RegistryError } from "./errors.js";

/**
 * Read-only view of the identity registry that dependent registries are given.
 * Nothing behind this interface mutates identity state.
 */
export interface AgentAuthority {
  agentExists(agentId: number): boolean;
  /** Throws AGENT_NOT_FOUND for unknown agents. */
  ownerOf(agentId: number): HexAddress;
  agentWalletOf(agentId: number): HexAddress | null;
}

export function requireAgent(authority: AgentAuthority, agentId: number): void {
  if (!authority.agentExists(agentId)) {
    throw new RegistryError("AGENT_NOT_FOUND", `agent ${agentId} does not exist`, { agentId });
  }
}

/** Owner or delegated wallet of the agent. */
export function controlsAgent(authority: AgentAuthority, agentId: number, address: HexAddress): boolean {
  if (sameAddress(authority.ownerOf(agentId), address)) {
    return true;
  }
  return sameAddress(authority.agentWalletOf(agentId), address);
}
