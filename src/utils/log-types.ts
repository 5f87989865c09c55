/**
 * Structured log entry types for JSONL output
 */

/** Context fields that can be bound to a child logger */
export interface LogContext {
  component?: "reader" | "decoder" | "source" | "config";
  source?: string; // File path or source description
  lineNumber?: number; // 1-based line within the source
  messageType?: string;
  operationType?: string;
  field?: string; // Wire field name a problem was found in
  errorCode?: string; // e.g. "FIELD_FORMAT", "ILLEGAL_COMBINATION"
  [key: string]: unknown;
}

export interface LogEntry extends LogContext {
  ts: string; // ISO 8601 timestamp
  level: "debug" | "info" | "warn" | "error";
  msg: string;
}
