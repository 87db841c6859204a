/** JSON.stringify that renders bigint values as decimal strings. */
export function stringifyJson(value: unknown, space?: number): string {
  return JSON.stringify(value, (_key, entry: unknown) => (typeof entry === "bigint" ? entry.toString() : entry), space);
}

/** Deep copy with every bigint replaced by its decimal string. */
export function toJsonSafe(value: unknown): unknown {
  const parsed: unknown = JSON.parse(stringifyJson(value));
  return parsed;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseJsonRecord(input: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(input);
  if (!isRecord(parsed)) {
    throw new Error(`expected a JSON object, got ${typeof parsed}`);
  }
  return parsed;
}
