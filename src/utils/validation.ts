/**
 * Fail-fast field readers for untrusted JSON
 *
 * Each reader either returns the typed value or calls `fail` with the
 * field path (e.g. "requirement_coverage[2].matched_evidence[0].evidence_id").
 * Callers choose the error class through `fail`.
 */

export type Fail = (message: string) => never;

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function expectRecord(value: unknown, path: string, fail: Fail): JsonRecord {
  if (!isRecord(value)) {
    return fail(`${path} must be an object`);
  }
  return value;
}

export function readString(
  record: JsonRecord,
  key: string,
  path: string,
  fail: Fail,
  options: { nonEmpty?: boolean } = {},
): string {
  const value = record[key];
  if (typeof value !== "string") {
    return fail(`${path}.${key} must be a string, got ${typeof value}`);
  }
  if (options.nonEmpty && value.trim().length === 0) {
    return fail(`${path}.${key} cannot be empty or whitespace-only`);
  }
  return value;
}

export function readOptionalString(
  record: JsonRecord,
  key: string,
  path: string,
  fail: Fail,
): string | undefined {
  if (record[key] === undefined) return undefined;
  return readString(record, key, path, fail);
}

export function readNullableString(
  record: JsonRecord,
  key: string,
  path: string,
  fail: Fail,
): string | null {
  if (record[key] === null) return null;
  return readString(record, key, path, fail);
}

export function readNumber(
  record: JsonRecord,
  key: string,
  path: string,
  fail: Fail,
): number {
  const value = record[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return fail(`${path}.${key} must be a finite number`);
  }
  return value;
}

/**
 * Number in [0, 1] (scores, rates, confidences)
 */
export function readUnitInterval(
  record: JsonRecord,
  key: string,
  path: string,
  fail: Fail,
): number {
  const value = readNumber(record, key, path, fail);
  if (value < 0 || value > 1) {
    return fail(`${path}.${key} must be between 0 and 1, got ${value}`);
  }
  return value;
}

export function readBoolean(
  record: JsonRecord,
  key: string,
  path: string,
  fail: Fail,
): boolean {
  const value = record[key];
  if (typeof value !== "boolean") {
    return fail(`${path}.${key} must be a boolean, got ${typeof value}`);
  }
  return value;
}

export function readArray(
  record: JsonRecord,
  key: string,
  path: string,
  fail: Fail,
): unknown[] {
  const value = record[key];
  if (!Array.isArray(value)) {
    return fail(`${path}.${key} must be an array`);
  }
  return value;
}

export function readStringArray(
  record: JsonRecord,
  key: string,
  path: string,
  fail: Fail,
): string[] {
  return readArray(record, key, path, fail).map((item, i) => {
    if (typeof item !== "string") {
      return fail(`${path}.${key}[${i}] must be a string`);
    }
    return item;
  });
}

/**
 * String restricted to one of `allowed`
 */
export function readEnum<T extends string>(
  record: JsonRecord,
  key: string,
  allowed: readonly T[],
  path: string,
  fail: Fail,
): T {
  const value = readString(record, key, path, fail);
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    return fail(`${path}.${key} must be one of ${allowed.join(", ")}, got "${value}"`);
  }
  return match;
}

export function readNullableEnum<T extends string>(
  record: JsonRecord,
  key: string,
  allowed: readonly T[],
  path: string,
  fail: Fail,
): T | null {
  if (record[key] === null) return null;
  return readEnum(record, key, allowed, path, fail);
}

/**
 * Map each element of an array field through a reader, with indexed paths
 */
export function readList<T>(
  record: JsonRecord,
  key: string,
  path: string,
  fail: Fail,
  readItem: (item: JsonRecord, itemPath: string) => T,
): T[] {
  return readArray(record, key, path, fail).map((item, i) => {
    const itemPath = `${path}.${key}[${i}]`;
    return readItem(expectRecord(item, itemPath, fail), itemPath);
  });
}

export function readNumberArray(
  record: JsonRecord,
  key: string,
  path: string,
  fail: Fail,
): number[] {
  return readArray(record, key, path, fail).map((item, i) => {
    if (typeof item !== "number" || !Number.isFinite(item)) {
      return fail(`${path}.${key}[${i}] must be a finite number`);
    }
    return item;
  });
}
