import crypto from "node:crypto";
import { z } from "zod";
import { recoverMessageAddress, type PrivateKeyAccount } from "viem";
import { sameAddress } from "@trustledger/protocol-kernel";
import type { HexAddress, HexBytes } from "@trustledger/shared-types";
import { stringifyJson } from "@trustledger/state";

export const ENVELOPE_MAX_SKEW_SEC = 300;

const hex = z.string().refine((value): value is `0x${string}` => /^0x[0-9a-fA-F]*$/.test(value), "must be hex");

export const envelopeSchema = z
  .object({
    caller: hex,
    method: z.string().min(1),
    params: z.unknown().optional(),
    nonce: z.string().min(8).max(128),
    timestamp: z.number().int(),
    signature: hex,
  })
  .strict();

/** Signed transaction submitted over HTTP. */
export interface TransactionEnvelope {
  caller: HexAddress;
  method: string;
  params?: unknown;
  nonce: string;
  /** Unix seconds. */
  timestamp: number;
  signature: HexBytes;
}

export type UnsignedEnvelope = Omit<TransactionEnvelope, "signature">;

export type EnvelopeCheck =
  | { ok: true; caller: HexAddress; fingerprint: string; expiresAt: string }
  | { ok: false; error: string };

/** `trustledger:tx:v1|chainId|caller|method|timestamp|nonce|sha256(params)` */
export function envelopeMessage(chainId: number, envelope: UnsignedEnvelope): string {
  const paramsHash = crypto.createHash("sha256").update(stringifyJson(envelope.params ?? {})).digest("hex");
  return [
    "trustledger:tx:v1",
    String(chainId),
    envelope.caller.toLowerCase(),
    envelope.method,
    String(envelope.timestamp),
    envelope.nonce,
    paramsHash,
  ].join("|");
}

export async function signEnvelope(
  account: PrivateKeyAccount,
  chainId: number,
  input: { method: string; params?: unknown; nonce?: string; timestamp: number },
): Promise<TransactionEnvelope> {
  const unsigned: UnsignedEnvelope = {
    caller: account.address,
    method: input.method,
    params: input.params ?? {},
    nonce: input.nonce ?? crypto.randomBytes(16).toString("hex"),
    timestamp: input.timestamp,
  };
  const signature = await account.signMessage({ message: envelopeMessage(chainId, unsigned) });
  return { ...unsigned, signature };
}

/**
 * Checks the skew window and the signer. The fingerprint covers caller and
 * nonce, so a nonce is single-use per caller whatever the payload.
 */
export async function verifyEnvelope(
  envelope: TransactionEnvelope,
  chainId: number,
  nowSec: number,
): Promise<EnvelopeCheck> {
  if (Math.abs(nowSec - envelope.timestamp) > ENVELOPE_MAX_SKEW_SEC) {
    return { ok: false, error: "Request timestamp outside allowed skew window" };
  }

  const message = envelopeMessage(chainId, envelope);
  try {
    const recovered = await recoverMessageAddress({ message, signature: envelope.signature });
    if (!sameAddress(recovered, envelope.caller)) {
      return { ok: false, error: "Envelope signature address mismatch" };
    }
    return {
      ok: true,
      caller: recovered,
      fingerprint: crypto.createHash("sha256").update(`${recovered.toLowerCase()}|${envelope.nonce}`).digest("hex"),
      expiresAt: new Date((envelope.timestamp + ENVELOPE_MAX_SKEW_SEC) * 1000).toISOString(),
    };
  } catch (error) {
    return { ok: false, error: `Invalid envelope signature: ${error instanceof Error ? error.message : String(error)}` };
  }
}
