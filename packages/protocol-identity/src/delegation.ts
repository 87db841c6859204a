import { isHex, size, verifyTypedData, type TypedDataDomain } from "viem";
import type { DelegationMessage, ExecutionDomain, HexBytes } from "@trustledger/shared-types";

/**
 * Decides whether a signature proves control of the wallet being delegated.
 * Implementations must reject malformed and non-canonical signatures.
 */
export interface ProofOfControlVerifier {
  verify(message: DelegationMessage, signature: HexBytes): Promise<boolean>;
}

export const DELEGATION_TYPES = {
  AgentWalletSet: [
    { name: "agentId", type: "uint256" },
    { name: "newWallet", type: "address" },
    { name: "owner", type: "address" },
    { name: "nonce", type: "uint256" },
    { name: "deadline", type: "uint256" },
  ],
} as const;

const SECP256K1_HALF_ORDER = 0x7fffffffffffffffffffffffffffffff5d576e7357a4501ddfe92f46681b20a0n;
const ACCEPTED_V = new Set([0, 1, 27, 28]);

export function delegationDomain(domain: ExecutionDomain): TypedDataDomain {
  return {
    name: "AgentIdentityRegistry",
    version: "1",
    chainId: domain.chainId,
    verifyingContract: domain.identityRegistry,
  };
}

/** Typed data a wallet signs to accept delegation; pass to `signTypedData`. */
export function delegationTypedData(domain: ExecutionDomain, message: DelegationMessage) {
  return {
    domain: delegationDomain(domain),
    types: DELEGATION_TYPES,
    primaryType: "AgentWalletSet" as const,
    message: {
      agentId: BigInt(message.agentId),
      newWallet: message.wallet,
      owner: message.owner,
      nonce: BigInt(message.nonce),
      deadline: BigInt(message.deadline),
    },
  };
}

/** 65-byte r||s||v with a low-s value and a recognised recovery byte. */
export function isCanonicalSignature(signature: string): boolean {
  if (!isHex(signature, { strict: true }) || size(signature) !== 65) {
    return false;
  }

  const s = BigInt(`0x${signature.slice(66, 130)}`);
  const v = Number.parseInt(signature.slice(130, 132), 16);
  return s > 0n && s <= SECP256K1_HALF_ORDER && ACCEPTED_V.has(v);
}

export class Eip712DelegationVerifier implements ProofOfControlVerifier {
  private readonly domain: ExecutionDomain;

  constructor(domain: ExecutionDomain) {
    this.domain = domain;
  }

  async verify(message: DelegationMessage, signature: HexBytes): Promise<boolean> {
    if (!isCanonicalSignature(signature)) {
      return false;
    }

    try {
      return await verifyTypedData({
        address: message.wallet,
        ...delegationTypedData(this.domain, message),
        signature,
      });
    } catch {
      // r or s off the curve: no key recovers, so the proof is simply invalid.
      return false;
    }
  }
}
