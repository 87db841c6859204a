export const MAX_URI_LENGTH = 2048;
export const MAX_TEXT_LENGTH = 2048;
export const MAX_TAG_LENGTH = 128;
export const MAX_ENDPOINT_LENGTH = 512;
export const MAX_METADATA_KEY_LENGTH = 128;
export const MAX_RESPONSES_PER_FEEDBACK = 30;
export const MAX_CATEGORY_LENGTH = 64;

export const MAX_SCORE_DECIMALS = 18;
export const SCORE_SUMMARY_DECIMALS = 18;
export const MAX_INT128 = (1n << 127n) - 1n;
export const MIN_INT128 = -(1n << 127n);

export const VALIDATION_RESPONSE_MIN = 0;
export const VALIDATION_RESPONSE_MAX = 100;

/** Outcome recorded when a validator completes without a score. */
export const DEFAULT_COMPLETION_RESPONSE = VALIDATION_RESPONSE_MAX;
/** Outcome recorded when a validator rejects without a score. */
export const DEFAULT_REJECTION_RESPONSE = VALIDATION_RESPONSE_MIN;

export const MAX_DELEGATION_DEADLINE_DELAY_SEC = 300;
export const RESERVED_METADATA_KEY = "agentWallet";
