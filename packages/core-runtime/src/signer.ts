import { isHex, size, type PrivateKeyAccount } from "viem";
import { generatePrivateKey, privateKeyToAccount } from "viem/accounts";
import { delegationTypedData } from "@trustledger/protocol-identity";
import type { DelegationMessage, DelegationProof, ExecutionDomain } from "@trustledger/shared-types";

export const PRIVATE_KEY_ENV = "TRUSTLEDGER_PRIVATE_KEY";

/** Account for the key in TRUSTLEDGER_PRIVATE_KEY; the key is never written to disk. */
export function signerFromEnv(env: NodeJS.ProcessEnv = process.env): PrivateKeyAccount {
  const key = env[PRIVATE_KEY_ENV];
  if (!key) {
    throw new Error(`${PRIVATE_KEY_ENV} is not set`);
  }
  if (!isHex(key, { strict: true }) || size(key) !== 32) {
    throw new Error(`${PRIVATE_KEY_ENV} must be a 32-byte 0x-prefixed hex key`);
  }
  return privateKeyToAccount(key);
}

export function createSigner(): { privateKey: `0x${string}`; account: PrivateKeyAccount } {
  const privateKey = generatePrivateKey();
  return { privateKey, account: privateKeyToAccount(privateKey) };
}

/**
 * Proof that `wallet` accepts delegation for the agent. `wallet` must be the
 * signing account; the owner submits the proof in `identity.setAgentWallet`.
 */
export async function signDelegation(
  wallet: PrivateKeyAccount,
  domain: ExecutionDomain,
  message: DelegationMessage,
): Promise<DelegationProof> {
  if (wallet.address.toLowerCase() !== message.wallet.toLowerCase()) {
    throw new Error(`delegation for ${message.wallet} must be signed by that wallet, not ${wallet.address}`);
  }
  const signature = await wallet.signTypedData(delegationTypedData(domain, message));
  return { wallet: message.wallet, deadline: message.deadline, signature };
}
