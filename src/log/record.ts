/**
 * Parsing of a single access log line into a raw record
 */

import { MalformedRecordError } from "./errors.js";
import type { JsonObject, JsonValue, RawRecord } from "./types.js";

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return value !== null && value !== undefined && typeof value === "object" && !Array.isArray(value);
}

/**
 * Parse one line of the access log
 * The line must hold exactly one JSON object
 */
export function parseRecordLine(line: string, lineNumber?: number): RawRecord {
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedRecordError(reason, { cause: error, lineNumber });
  }

  if (!isJsonObject(parsed)) {
    const kind = parsed === null ? "null" : Array.isArray(parsed) ? "array" : typeof parsed;
    throw new MalformedRecordError(`expected a JSON object, got ${kind}`, { lineNumber });
  }

  return parsed;
}
