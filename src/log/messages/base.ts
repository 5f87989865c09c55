/**
 * Fields shared by every access log message and by every operation message
 */

import type { FieldAccessor } from "../accessor.js";
import type { DecodeContext } from "../context.js";
import {
  decodeInterServerRequestControls,
  decodeIntermediateClientRequestControl,
  decodeOperationPurposeRequestControl,
} from "../decoders/controls.js";
import type {
  InterServerRequestControl,
  IntermediateClientRequestControl,
  OperationPurposeRequestControl,
} from "../decoders/controls.js";
import { decodeNameValuePairs } from "../decoders/name-value.js";
import { FIELDS } from "../fields.js";
import type { MessageType, OperationMessageType, OperationType } from "../types.js";

export interface AccessLogMessageBase {
  readonly messageType: MessageType;
  readonly timestamp: Date;
  /** Normally "access" */
  readonly logType: string | null;
  readonly productName: string | null;
  readonly instanceName: string | null;
  readonly startupID: string | null;
  readonly threadID: number | null;
  readonly connectionID: number | null;
}

export interface OperationMessageBase extends AccessLogMessageBase {
  readonly messageType: OperationMessageType;
  readonly operationType: OperationType;
  readonly operationID: number | null;
  readonly messageID: number | null;
  readonly triggeredByConnectionID: number | null;
  readonly triggeredByOperationID: number | null;
  readonly origin: string | null;
  /** Extra name/value detail about where an internal operation came from */
  readonly originDetails: ReadonlyMap<string, string>;
  readonly requesterIPAddress: string | null;
  readonly requesterDN: string | null;
  readonly requestControlOIDs: ReadonlySet<string>;
  readonly usingAdminSessionWorkerThread: boolean | null;
  readonly administrativeOperationMessage: string | null;
  readonly intermediateClientRequestControl: IntermediateClientRequestControl | null;
  readonly operationPurposeRequestControl: OperationPurposeRequestControl | null;
  readonly interServerRequestControls: readonly InterServerRequestControl[];
}

/** Target of a request the server forwarded to a backend */
export interface ForwardTargetFields {
  readonly targetHost: string | null;
  readonly targetPort: number | null;
  readonly targetProtocol: string | null;
}

/** Freeze a decoded value in place and hand it back with its own type */
export function frozen<T extends object>(value: T): T {
  Object.freeze(value);
  return value;
}

export function decodeCommonFields<M extends MessageType>(
  accessor: FieldAccessor,
  messageType: M
): AccessLogMessageBase & { readonly messageType: M } {
  return {
    messageType,
    timestamp: accessor.getRequiredDate(FIELDS.timestamp),
    logType: accessor.getString(FIELDS.logType),
    productName: accessor.getString(FIELDS.product),
    instanceName: accessor.getString(FIELDS.instanceName),
    startupID: accessor.getString(FIELDS.startupID),
    threadID: accessor.getLong(FIELDS.threadID),
    connectionID: accessor.getLong(FIELDS.connectionID),
  };
}

export function decodeOperationFields<M extends OperationMessageType, O extends OperationType>(
  accessor: FieldAccessor,
  messageType: M,
  operationType: O,
  ctx: DecodeContext
): OperationMessageBase & { readonly messageType: M; readonly operationType: O } {
  return {
    ...decodeCommonFields(accessor, messageType),
    operationType,
    operationID: accessor.getLong(FIELDS.operationID),
    messageID: accessor.getInteger(FIELDS.messageID),
    triggeredByConnectionID: accessor.getLong(FIELDS.triggeredByConnectionID),
    triggeredByOperationID: accessor.getLong(FIELDS.triggeredByOperationID),
    origin: accessor.getString(FIELDS.origin),
    originDetails: decodeNameValuePairs(accessor, FIELDS.originDetails, "origin detail"),
    requesterIPAddress: accessor.getString(FIELDS.requesterIP),
    requesterDN: accessor.getString(FIELDS.requesterDN),
    requestControlOIDs: accessor.getStringSet(FIELDS.requestControlOIDs),
    usingAdminSessionWorkerThread: accessor.getBoolean(FIELDS.usingAdminSessionWorkerThread),
    administrativeOperationMessage: accessor.getString(FIELDS.administrativeOperation),
    intermediateClientRequestControl: decodeIntermediateClientRequestControl(
      accessor,
      FIELDS.intermediateClientRequestControl,
      ctx
    ),
    operationPurposeRequestControl: decodeOperationPurposeRequestControl(accessor, FIELDS.operationPurposeRequestControl),
    interServerRequestControls: decodeInterServerRequestControls(accessor, FIELDS.interServerRequestControls),
  };
}

export function decodeForwardTarget(accessor: FieldAccessor): ForwardTargetFields {
  return {
    targetHost: accessor.getString(FIELDS.targetHost),
    targetPort: accessor.getInteger(FIELDS.targetPort),
    targetProtocol: accessor.getString(FIELDS.targetProtocol),
  };
}
