export type RegistryErrorKind = "input" | "reference" | "authorization" | "state" | "integrity";

const KIND_BY_CODE = {
  ZERO_ADDRESS: "input",
  INVALID_ADDRESS: "input",
  INVALID_HASH: "input",
  INVALID_ARGUMENT: "input",
  STRING_TOO_LONG: "input",
  EMPTY_STRING: "input",
  RESERVED_METADATA_KEY: "input",
  DEADLINE_TOO_FAR: "input",
  INVALID_SIGNATURE: "input",
  SIGNATURE_EXPIRED: "input",
  AGENT_NOT_FOUND: "reference",
  FEEDBACK_NOT_FOUND: "reference",
  REQUEST_NOT_FOUND: "reference",
  INCIDENT_NOT_FOUND: "reference",
  NOT_AUTHORIZED: "authorization",
  NOT_OWNER: "authorization",
  SELF_FEEDBACK: "authorization",
  ALREADY_REVOKED: "state",
  FEEDBACK_REVOKED: "state",
  THREAD_FULL: "state",
  INVALID_STATUS: "state",
  ALREADY_ACTIVE: "state",
  ALREADY_INACTIVE: "state",
  WALLET_NOT_SET: "state",
  TRANSFER_REJECTED: "state",
  ID_COLLISION: "integrity",
  REPLAY_DIVERGED: "integrity",
  DOMAIN_MISMATCH: "integrity",
  LEDGER_HALTED: "integrity",
} as const satisfies Record<string, RegistryErrorKind>;

export type RegistryErrorCode = keyof typeof KIND_BY_CODE;

export class RegistryError extends Error {
  readonly code: RegistryErrorCode;
  readonly kind: RegistryErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(code: RegistryErrorCode, message: string, details?: Record<string, unknown>) {
    super(`${code}: ${message}`);
    this.name = "RegistryError";
    this.code = code;
    this.kind = KIND_BY_CODE[code];
    this.details = details;
  }
}

export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}

