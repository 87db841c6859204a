import { RegistryError } from "./errors.js";

export function requireMaxLength(value: string, max: number, field: string): string {
  if (value.length > max) {
    throw new RegistryError("STRING_TOO_LONG", `${field} exceeds ${max} characters`, {
      field,
      length: value.length,
      max,
    });
  }
  return value;
}

export function requireNonEmpty(value: string, max: number, field: string): string {
  if (value.length === 0) {
    throw new RegistryError("EMPTY_STRING", `${field} is required`, { field });
  }
  return requireMaxLength(value, max, field);
}

export function requireId(value: number, field: string): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RegistryError("INVALID_ARGUMENT", `${field} must be a non-negative integer`, { field, value });
  }
  return value;
}
