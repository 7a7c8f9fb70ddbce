import { SerializationError } from "@/errors";
import type { JsonRecord } from "@/utils";
import { expectRecord } from "@/utils";

export function failSerialization(message: string): never {
  throw new SerializationError(message);
}

/**
 * JSON.parse into a record, as a SerializationError on failure
 */
export function parseJsonRecord(json: string, label: string): JsonRecord {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return failSerialization(`${label} is not valid JSON (${reason})`);
  }
  return expectRecord(value, label, failSerialization);
}
