import { getAddress, isAddress, isHex, size, zeroAddress } from "viem";
import type { Bytes32, HexAddress, HexBytes } from "@trustledger/shared-types";
import { RegistryError } from "./errors.js";

export const ZERO_ADDRESS: HexAddress = zeroAddress;

/** Checksums `value`, rejecting malformed and zero addresses. */
export function requireAddress(value: string, field: string): HexAddress {
  if (!isAddress(value, { strict: false })) {
    throw new RegistryError("INVALID_ADDRESS", `${field} is not a 20-byte hex address`, { field, value });
  }

  const normalized = getAddress(value);
  if (normalized === ZERO_ADDRESS) {
    throw new RegistryError("ZERO_ADDRESS", `${field} must not be the zero address`, { field });
  }
  return normalized;
}

export function normalizeAddress(value: string): HexAddress | null {
  if (!isAddress(value, { strict: false })) {
    return null;
  }
  return getAddress(value);
}

export function sameAddress(left: string | null | undefined, right: string | null | undefined): boolean {
  if (!left || !right) {
    return false;
  }
  return left.toLowerCase() === right.toLowerCase();
}

export function normalizeBytes32(value: string): Bytes32 | null {
  const lowered = value.toLowerCase();
  if (!isHex(lowered, { strict: true }) || size(lowered) !== 32) {
    return null;
  }
  return lowered;
}

/** Lower-cased 32-byte hex value. */
export function requireBytes32(value: string, field: string): Bytes32 {
  const normalized = normalizeBytes32(value);
  if (normalized === null) {
    throw new RegistryError("INVALID_HASH", `${field} must be 32 bytes of hex`, { field });
  }
  return normalized;
}

export function optionalBytes32(value: string | undefined, field: string): Bytes32 | null {
  return value === undefined ? null : requireBytes32(value, field);
}

export function requireHexBytes(value: string, field: string): HexBytes {
  if (!isHex(value, { strict: true })) {
    throw new RegistryError("INVALID_ARGUMENT", `${field} must be 0x-prefixed hex`, { field });
  }
  return value;
}
