/**
 * Result code resolution
 *
 * Numeric values map to canonical names from data/result-codes.json.
 * Values the table does not know keep the numeric value and the logged name.
 */

import { readFileSync } from "node:fs";
import type { FieldAccessor } from "../accessor.js";
import { FieldFormatError } from "../errors.js";
import type { FieldDescriptor } from "../fields.js";

export interface ResultCode {
  readonly value: number;
  readonly name: string;
}

interface ResultCodeTable {
  byValue: Map<number, ResultCode>;
  byName: Map<string, ResultCode>;
}

const TABLE_URL = new URL("../../../data/result-codes.json", import.meta.url);

let table: ResultCodeTable | undefined;

function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s_-]+/g, " ");
}

function isResultCodeEntry(entry: unknown): entry is ResultCode {
  if (entry === null || typeof entry !== "object") return false;
  const value: unknown = Reflect.get(entry, "value");
  const name: unknown = Reflect.get(entry, "name");
  return typeof value === "number" && Number.isInteger(value) && typeof name === "string";
}

function loadTable(): ResultCodeTable {
  if (table) return table;

  const parsed: unknown = JSON.parse(readFileSync(TABLE_URL, "utf-8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`Invalid result code table at ${TABLE_URL.pathname}: expected an array`);
  }

  const byValue = new Map<number, ResultCode>();
  const byName = new Map<string, ResultCode>();
  parsed.forEach((entry: unknown, index) => {
    if (!isResultCodeEntry(entry)) {
      throw new Error(`Invalid result code table entry at index ${index}`);
    }
    const code = Object.freeze({ value: entry.value, name: entry.name });
    byValue.set(code.value, code);
    byName.set(normalizeName(code.name), code);
  });

  table = { byValue, byName };
  return table;
}

/** Resolve a numeric result code, keeping unknown values */
export function resultCodeForValue(value: number, loggedName?: string | null): ResultCode {
  const known = loadTable().byValue.get(value);
  if (known) return known;
  return Object.freeze({ value, name: loggedName ?? `unknown result code ${value}` });
}

/** Resolve a result code by name, ignoring case and separators */
export function resultCodeForName(name: string): ResultCode | null {
  return loadTable().byName.get(normalizeName(name)) ?? null;
}

/**
 * Decode a numeric result code and its symbolic name from a record
 * Returns null when neither field is present
 */
export function decodeResultCode(
  accessor: FieldAccessor,
  valueField: FieldDescriptor<"integer">,
  nameField: FieldDescriptor<"string">
): ResultCode | null {
  const value = accessor.getInteger(valueField);
  const name = accessor.getString(nameField);

  if (value !== null) {
    return resultCodeForValue(value, name);
  }
  if (name === null) {
    return null;
  }

  const byName = resultCodeForName(name);
  if (!byName) {
    throw new FieldFormatError(accessor.qualify(nameField.name), "result code name", `"${name}" is not recognized`);
  }
  return byName;
}
