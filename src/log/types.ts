/**
 * Core types for JSON-formatted access log decoding
 */

/** Any value that can appear in a parsed JSON log line */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

/** A JSON object with string keys */
export interface JsonObject {
  [key: string]: JsonValue;
}

/** One parsed log line: field name to generic JSON value, in line order */
export type RawRecord = Readonly<JsonObject>;

/** Every message type the access log can contain */
export const MESSAGE_TYPES = [
  "CONNECT",
  "DISCONNECT",
  "SECURITY_NEGOTIATION",
  "CLIENT_CERTIFICATE",
  "ENTRY_REBALANCING_REQUEST",
  "ENTRY_REBALANCING_RESULT",
  "REQUEST",
  "FORWARD",
  "FORWARD_FAILED",
  "RESULT",
  "ASSURANCE_COMPLETE",
  "ENTRY",
  "REFERENCE",
  "INTERMEDIATE_RESPONSE",
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

/** Message types that describe a connection rather than an operation */
export const CONNECTION_MESSAGE_TYPES = [
  "CONNECT",
  "DISCONNECT",
  "SECURITY_NEGOTIATION",
  "CLIENT_CERTIFICATE",
  "ENTRY_REBALANCING_REQUEST",
  "ENTRY_REBALANCING_RESULT",
] as const;

export type ConnectionMessageType = (typeof CONNECTION_MESSAGE_TYPES)[number];

/** Message types that always carry an operation type */
export type OperationMessageType = Exclude<MessageType, ConnectionMessageType>;

/** Every operation type an operation-scoped message can describe */
export const OPERATION_TYPES = [
  "ABANDON",
  "ADD",
  "BIND",
  "COMPARE",
  "DELETE",
  "EXTENDED",
  "MODIFY",
  "MODDN",
  "SEARCH",
  "UNBIND",
] as const;

export type OperationType = (typeof OPERATION_TYPES)[number];

/** Operations whose changes are replicated and may wait for assurance */
export const MUTATING_OPERATION_TYPES = ["ADD", "DELETE", "MODIFY", "MODDN"] as const;

export type MutatingOperationType = (typeof MUTATING_OPERATION_TYPES)[number];

/** Operations that a directory proxy can forward and that produce a result */
export type RespondingOperationType = Exclude<OperationType, "UNBIND">;

const RESPONDING_OPERATION_TYPES: readonly RespondingOperationType[] = OPERATION_TYPES.filter(
  (type): type is RespondingOperationType => type !== "UNBIND"
);

/**
 * Legality matrix: the operation types that may appear with each
 * operation-scoped message type
 */
export const LEGAL_OPERATION_TYPES = {
  REQUEST: OPERATION_TYPES,
  FORWARD: RESPONDING_OPERATION_TYPES,
  FORWARD_FAILED: RESPONDING_OPERATION_TYPES,
  RESULT: RESPONDING_OPERATION_TYPES,
  ASSURANCE_COMPLETE: MUTATING_OPERATION_TYPES,
  ENTRY: ["SEARCH"],
  REFERENCE: ["SEARCH"],
  INTERMEDIATE_RESPONSE: OPERATION_TYPES,
} as const satisfies Record<OperationMessageType, readonly OperationType[]>;

export function isConnectionMessageType(type: MessageType): type is ConnectionMessageType {
  const connectionTypes: readonly MessageType[] = CONNECTION_MESSAGE_TYPES;
  return connectionTypes.includes(type);
}

export function isLegalCombination(messageType: OperationMessageType, operationType: OperationType): boolean {
  const legal: readonly OperationType[] = LEGAL_OPERATION_TYPES[messageType];
  return legal.includes(operationType);
}

/**
 * Normalize a wire token to its enum spelling
 * Tokens are case-insensitive and "-" and "_" are interchangeable
 */
function normalizeToken(token: string): string {
  return token.trim().toUpperCase().replace(/-/g, "_");
}

export function parseMessageType(token: string): MessageType | null {
  const normalized = normalizeToken(token);
  return MESSAGE_TYPES.find((type) => type === normalized) ?? null;
}

export function parseOperationType(token: string): OperationType | null {
  const normalized = normalizeToken(token);
  return OPERATION_TYPES.find((type) => type === normalized) ?? null;
}
