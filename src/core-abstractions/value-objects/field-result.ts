// CORE ABSTRACTIONS - Outcome of validating one form field
// Either the typed value or the error explaining why the raw input was refused

import { TaskFormError } from '../errors/task-form.errors';

export type FieldResult<T, E extends TaskFormError = TaskFormError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function accept<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function reject<E extends TaskFormError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

// Splits on the separator and parses every component as a base-10 integer.
// Returns null when any component is not an integer.
export function splitIntegers(raw: string, separator: string): { count: number; values: number[] | null } {
  const parts = raw.split(separator);
  const values = parts.every(part => INTEGER_PATTERN.test(part))
    ? parts.map(part => Number.parseInt(part.trim(), 10))
    : null;
  return { count: parts.length, values };
}
