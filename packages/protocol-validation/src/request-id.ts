import { encodeAbiParameters, keccak256, parseAbiParameters } from "viem";
import type { Bytes32, HexAddress } from "@trustledger/shared-types";

const REQUEST_ID_PARAMS = parseAbiParameters(
  "address requester, address validator, uint256 agentId, bytes32 contentHash, uint256 nonce, uint256 chainId, address registry",
);
const CONTENT_HASH_PARAMS = parseAbiParameters(
  "address requester, address validator, uint256 agentId, string requestURI",
);

export interface RequestIdInput {
  requester: HexAddress;
  validator: HexAddress;
  agentId: number;
  contentHash: Bytes32;
  nonce: number;
  chainId: number;
  registry: HexAddress;
}

/**
 * keccak256 over the ABI-encoded request tuple. The per-requester nonce and the
 * domain (chain id + registry address) make ids unique across requesters,
 * repeated submissions and deployments.
 */
export function deriveRequestId(input: RequestIdInput): Bytes32 {
  return keccak256(
    encodeAbiParameters(REQUEST_ID_PARAMS, [
      input.requester,
      input.validator,
      BigInt(input.agentId),
      input.contentHash,
      BigInt(input.nonce),
      BigInt(input.chainId),
      input.registry,
    ]),
  );
}

/** Content hash used when the requester does not supply one. */
export function defaultContentHash(
  requester: HexAddress,
  validator: HexAddress,
  agentId: number,
  requestURI: string,
): Bytes32 {
  return keccak256(encodeAbiParameters(CONTENT_HASH_PARAMS, [requester, validator, BigInt(agentId), requestURI]));
}
