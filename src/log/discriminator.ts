/**
 * Message discrimination: selects the one constructor for a record's
 * message type and operation type
 */

import { FieldAccessor } from "./accessor.js";
import { createDecodeContext } from "./context.js";
import type { DecodeContext, DecodeOptions } from "./context.js";
import { IllegalCombinationError, InvalidEnumValueError, MissingRequiredFieldError } from "./errors.js";
import { FIELDS } from "./fields.js";
import type { FieldDescriptor } from "./fields.js";
import {
  decodeClientCertificateMessage,
  decodeConnectMessage,
  decodeDisconnectMessage,
  decodeSecurityNegotiationMessage,
} from "./messages/connection.js";
import type { AccessLogMessage, ConnectionMessageMap, MessageConstructor, OperationMessageMap } from "./messages/index.js";
import {
  buildAssuranceCompletedMessage,
  buildForwardFailedMessage,
  buildForwardMessage,
  buildIntermediateResponseMessage,
  buildRequestMessage,
  buildResultMessage,
  buildSearchEntryMessage,
  buildSearchReferenceMessage,
} from "./messages/operation.js";
import { decodeEntryRebalancingRequestMessage, decodeEntryRebalancingResultMessage } from "./messages/rebalancing.js";
import {
  isConnectionMessageType,
  isLegalCombination,
  parseMessageType,
  parseOperationType,
} from "./types.js";
import type {
  MessageType,
  MutatingOperationType,
  OperationType,
  RawRecord,
  RespondingOperationType,
} from "./types.js";

type OperationConstructorTable = {
  [M in keyof OperationMessageMap]: {
    [O in keyof OperationMessageMap[M]]: MessageConstructor<OperationMessageMap[M][O]>;
  };
};

const CONNECTION_CONSTRUCTORS: { [M in keyof ConnectionMessageMap]: MessageConstructor<ConnectionMessageMap[M]> } = {
  CONNECT: decodeConnectMessage,
  DISCONNECT: decodeDisconnectMessage,
  SECURITY_NEGOTIATION: decodeSecurityNegotiationMessage,
  CLIENT_CERTIFICATE: decodeClientCertificateMessage,
  ENTRY_REBALANCING_REQUEST: decodeEntryRebalancingRequestMessage,
  ENTRY_REBALANCING_RESULT: decodeEntryRebalancingResultMessage,
};

const request =
  <O extends OperationType>(operationType: O) =>
  (accessor: FieldAccessor, ctx: DecodeContext) =>
    buildRequestMessage(accessor, ctx, operationType);

const forward =
  <O extends RespondingOperationType>(operationType: O) =>
  (accessor: FieldAccessor, ctx: DecodeContext) =>
    buildForwardMessage(accessor, ctx, operationType);

const forwardFailed =
  <O extends RespondingOperationType>(operationType: O) =>
  (accessor: FieldAccessor, ctx: DecodeContext) =>
    buildForwardFailedMessage(accessor, ctx, operationType);

const result =
  <O extends RespondingOperationType>(operationType: O) =>
  (accessor: FieldAccessor, ctx: DecodeContext) =>
    buildResultMessage(accessor, ctx, operationType);

const assuranceCompleted =
  <O extends MutatingOperationType>(operationType: O) =>
  (accessor: FieldAccessor, ctx: DecodeContext) =>
    buildAssuranceCompletedMessage(accessor, ctx, operationType);

const intermediateResponse =
  <O extends OperationType>(operationType: O) =>
  (accessor: FieldAccessor, ctx: DecodeContext) =>
    buildIntermediateResponseMessage(accessor, ctx, operationType);

/** One constructor per legal (message type, operation type) pair */
const OPERATION_CONSTRUCTORS: OperationConstructorTable = {
  REQUEST: {
    ABANDON: request("ABANDON"),
    ADD: request("ADD"),
    BIND: request("BIND"),
    COMPARE: request("COMPARE"),
    DELETE: request("DELETE"),
    EXTENDED: request("EXTENDED"),
    MODIFY: request("MODIFY"),
    MODDN: request("MODDN"),
    SEARCH: request("SEARCH"),
    UNBIND: request("UNBIND"),
  },
  FORWARD: {
    ABANDON: forward("ABANDON"),
    ADD: forward("ADD"),
    BIND: forward("BIND"),
    COMPARE: forward("COMPARE"),
    DELETE: forward("DELETE"),
    EXTENDED: forward("EXTENDED"),
    MODIFY: forward("MODIFY"),
    MODDN: forward("MODDN"),
    SEARCH: forward("SEARCH"),
  },
  FORWARD_FAILED: {
    ABANDON: forwardFailed("ABANDON"),
    ADD: forwardFailed("ADD"),
    BIND: forwardFailed("BIND"),
    COMPARE: forwardFailed("COMPARE"),
    DELETE: forwardFailed("DELETE"),
    EXTENDED: forwardFailed("EXTENDED"),
    MODIFY: forwardFailed("MODIFY"),
    MODDN: forwardFailed("MODDN"),
    SEARCH: forwardFailed("SEARCH"),
  },
  RESULT: {
    ABANDON: result("ABANDON"),
    ADD: result("ADD"),
    BIND: result("BIND"),
    COMPARE: result("COMPARE"),
    DELETE: result("DELETE"),
    EXTENDED: result("EXTENDED"),
    MODIFY: result("MODIFY"),
    MODDN: result("MODDN"),
    SEARCH: result("SEARCH"),
  },
  ASSURANCE_COMPLETE: {
    ADD: assuranceCompleted("ADD"),
    DELETE: assuranceCompleted("DELETE"),
    MODIFY: assuranceCompleted("MODIFY"),
    MODDN: assuranceCompleted("MODDN"),
  },
  ENTRY: {
    SEARCH: buildSearchEntryMessage,
  },
  REFERENCE: {
    SEARCH: buildSearchReferenceMessage,
  },
  INTERMEDIATE_RESPONSE: {
    ABANDON: intermediateResponse("ABANDON"),
    ADD: intermediateResponse("ADD"),
    BIND: intermediateResponse("BIND"),
    COMPARE: intermediateResponse("COMPARE"),
    DELETE: intermediateResponse("DELETE"),
    EXTENDED: intermediateResponse("EXTENDED"),
    MODIFY: intermediateResponse("MODIFY"),
    MODDN: intermediateResponse("MODDN"),
    SEARCH: intermediateResponse("SEARCH"),
    UNBIND: intermediateResponse("UNBIND"),
  },
};

/** Read a required enum token, distinguishing absent from unrecognized */
function readToken<T>(record: RawRecord, field: FieldDescriptor<"string">, parse: (token: string) => T | null): T {
  const raw = Object.prototype.hasOwnProperty.call(record, field.name) ? record[field.name] : null;
  if (raw === null) {
    throw new MissingRequiredFieldError(field.name);
  }
  if (typeof raw !== "string") {
    throw new InvalidEnumValueError(field.name, JSON.stringify(raw));
  }
  const parsed = parse(raw);
  if (parsed === null) {
    throw new InvalidEnumValueError(field.name, raw);
  }
  return parsed;
}

export function readMessageType(record: RawRecord): MessageType {
  return readToken(record, FIELDS.messageType, parseMessageType);
}

export function readOperationType(record: RawRecord): OperationType {
  return readToken(record, FIELDS.operationType, parseOperationType);
}

/**
 * Decode one raw record into its message
 * Any field error aborts the whole message
 */
export function decodeAccessLogRecord(record: RawRecord, options?: DecodeOptions): AccessLogMessage {
  const accessor = new FieldAccessor(record);
  const ctx = createDecodeContext(options);

  accessor.getRequiredDate(FIELDS.timestamp);
  const messageType = readMessageType(record);

  if (isConnectionMessageType(messageType)) {
    return CONNECTION_CONSTRUCTORS[messageType](accessor, ctx);
  }

  const operationType = readOperationType(record);
  if (!isLegalCombination(messageType, operationType)) {
    throw new IllegalCombinationError(messageType, operationType);
  }

  const constructors: Partial<Record<OperationType, MessageConstructor<AccessLogMessage>>> =
    OPERATION_CONSTRUCTORS[messageType];
  const construct = constructors[operationType];
  if (!construct) {
    throw new IllegalCombinationError(messageType, operationType);
  }
  return construct(accessor, ctx);
}
