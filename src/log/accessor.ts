/**
 * Typed field access over a raw access log record
 *
 * Absent fields (missing or JSON null) yield the kind's empty value.
 * Present fields of the wrong kind raise FieldFormatError naming the field.
 */

import { FieldFormatError, MissingRequiredFieldError } from "./errors.js";
import type { FieldDescriptor, FieldKind } from "./fields.js";
import { isJsonObject } from "./record.js";
import type { JsonValue, RawRecord } from "./types.js";

const INTEGER_PATTERN = /^-?\d+$/;
const DECIMAL_PATTERN = /^-?\d+(\.\d+)?([eE][+-]?\d+)?$/;
const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  return month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];
}

/**
 * Parse an RFC 3339 timestamp such as 2024-03-01T12:00:00.123Z
 * Returns null when the text is not a valid timestamp
 */
export function parseTimestamp(text: string): Date | null {
  const match = RFC3339_PATTERN.exec(text);
  if (!match) return null;

  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fraction, zulu, sign, offsetHourText, offsetMinuteText] =
    match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);
  const second = Number(secondText);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  let offsetMinutes = 0;
  if (!zulu) {
    const offsetHours = Number(offsetHourText);
    const offsetMins = Number(offsetMinuteText);
    if (offsetHours > 23 || offsetMins > 59) return null;
    offsetMinutes = (offsetHours * 60 + offsetMins) * (sign === "-" ? -1 : 1);
  }

  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0;

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millis);
  return new Date(date.getTime() - offsetMinutes * 60_000);
}

function describeKind(value: JsonValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

export class FieldAccessor {
  private readonly record: RawRecord;
  private readonly path: string | undefined;

  constructor(record: RawRecord, path?: string) {
    this.record = record;
    this.path = path;
  }

  /** Qualified name of a field, including the path of enclosing objects */
  qualify(name: string): string {
    return this.path ? `${this.path}.${name}` : name;
  }

  /** Whether the field is present with a non-null value */
  has(field: FieldDescriptor): boolean {
    return this.value(field) !== undefined;
  }

  getString(field: FieldDescriptor<"string">): string | null {
    const value = this.value(field);
    if (value === undefined) return null;
    if (typeof value === "string") return value;
    if (typeof value === "number" || typeof value === "boolean") return String(value);
    throw this.formatError(field, value);
  }

  getRequiredString(field: FieldDescriptor<"string">): string {
    const value = this.getString(field);
    if (value === null) {
      throw new MissingRequiredFieldError(this.qualify(field.name));
    }
    return value;
  }

  /** Signed 32-bit integer */
  getInteger(field: FieldDescriptor<"integer">): number | null {
    const value = this.integerValue(field);
    if (value === null) return null;
    if (value < INT32_MIN || value > INT32_MAX) {
      throw new FieldFormatError(this.qualify(field.name), "integer", `${value} is out of range`);
    }
    return value;
  }

  /** Integer within the safe-integer range */
  getLong(field: FieldDescriptor<"long">): number | null {
    return this.integerValue(field);
  }

  getDouble(field: FieldDescriptor<"double">): number | null {
    const value = this.value(field);
    if (value === undefined) return null;
    if (typeof value === "number") return value;
    if (typeof value === "string" && DECIMAL_PATTERN.test(value)) {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) return parsed;
    }
    throw this.formatError(field, value);
  }

  getBoolean(field: FieldDescriptor<"boolean">): boolean | null {
    const value = this.value(field);
    if (value === undefined) return null;
    if (typeof value === "boolean") return value;
    if (typeof value === "string") {
      const lower = value.toLowerCase();
      if (lower === "true") return true;
      if (lower === "false") return false;
    }
    throw this.formatError(field, value);
  }

  getDate(field: FieldDescriptor<"date">): Date | null {
    const value = this.value(field);
    if (value === undefined) return null;
    if (typeof value === "string") {
      const parsed = parseTimestamp(value);
      if (parsed) return parsed;
      throw new FieldFormatError(this.qualify(field.name), "date", `"${value}" is not an RFC 3339 timestamp`);
    }
    throw this.formatError(field, value);
  }

  getRequiredDate(field: FieldDescriptor<"date">): Date {
    const value = this.getDate(field);
    if (value === null) {
      throw new MissingRequiredFieldError(this.qualify(field.name));
    }
    return value;
  }

  /** Ordered list of strings; a lone string is a one-element list */
  getStringList(field: FieldDescriptor<"stringList">): readonly string[] {
    return Object.freeze(this.strings(field));
  }

  /** Unordered set of strings; a lone string is a one-element set */
  getStringSet(field: FieldDescriptor<"stringSet">): ReadonlySet<string> {
    return new Set(this.strings(field));
  }

  /** Nested object, as an accessor whose errors name the enclosing field */
  getObject(field: FieldDescriptor<"object">): FieldAccessor | null {
    const value = this.value(field);
    if (value === undefined) return null;
    if (!isJsonObject(value)) throw this.formatError(field, value);
    return new FieldAccessor(value, this.qualify(field.name));
  }

  getObjectList(field: FieldDescriptor<"objectList">): readonly FieldAccessor[] {
    const value = this.value(field);
    if (value === undefined) return [];
    if (!Array.isArray(value)) throw this.formatError(field, value);

    const name = this.qualify(field.name);
    return value.map((element, index): FieldAccessor => {
      if (!isJsonObject(element)) {
        throw new FieldFormatError(`${name}[${index}]`, "object", `got ${describeKind(element)}`);
      }
      return new FieldAccessor(element, `${name}[${index}]`);
    });
  }

  private value(field: FieldDescriptor): JsonValue | undefined {
    if (!Object.prototype.hasOwnProperty.call(this.record, field.name)) return undefined;
    const value = this.record[field.name];
    return value === null ? undefined : value;
  }

  private integerValue(field: FieldDescriptor<"integer" | "long">): number | null {
    const value = this.value(field);
    if (value === undefined) return null;

    let parsed: number | undefined;
    if (typeof value === "number") {
      parsed = value;
    } else if (typeof value === "string" && INTEGER_PATTERN.test(value)) {
      parsed = Number(value);
    }

    if (parsed === undefined || !Number.isSafeInteger(parsed)) {
      throw this.formatError(field, value);
    }
    return parsed;
  }

  private strings(field: FieldDescriptor<"stringList" | "stringSet">): string[] {
    const value = this.value(field);
    if (value === undefined) return [];
    if (typeof value === "string") return [value];
    if (!Array.isArray(value)) throw this.formatError(field, value);

    const name = this.qualify(field.name);
    return value.map((element, index): string => {
      if (typeof element !== "string") {
        throw new FieldFormatError(`${name}[${index}]`, "string", `got ${describeKind(element)}`);
      }
      return element;
    });
  }

  private formatError(field: FieldDescriptor, value: JsonValue): FieldFormatError {
    const expected: Record<FieldKind, string> = {
      string: "string",
      integer: "integer",
      long: "integer",
      double: "number",
      boolean: "boolean",
      date: "date",
      stringList: "list of strings",
      stringSet: "set of strings",
      object: "object",
      objectList: "list of objects",
    };
    const shown = typeof value === "string" ? `"${value}"` : describeKind(value);
    return new FieldFormatError(this.qualify(field.name), expected[field.kind], `got ${shown}`);
  }
}

