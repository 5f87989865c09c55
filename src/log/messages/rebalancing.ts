/**
 * Entry rebalancing messages
 *
 * A rebalancing operation migrates a subtree between backend sets of an
 * entry-balancing proxy. The request is logged when the migration starts
 * and the result when it ends.
 */

import type { FieldAccessor } from "../accessor.js";
import { decodeEndpoint } from "../decoders/endpoint.js";
import { decodeResultCode } from "../decoders/result-code.js";
import type { ResultCode } from "../decoders/result-code.js";
import { FIELDS } from "../fields.js";
import { decodeCommonFields, frozen } from "./base.js";
import type { AccessLogMessageBase } from "./base.js";

interface RebalancingRequestFields {
  readonly rebalancingOperationID: number | null;
  readonly triggeredByConnectionID: number | null;
  readonly triggeredByOperationID: number | null;
  readonly subtreeBaseDN: string | null;
  readonly sizeLimit: number | null;
  readonly sourceBackendSetName: string | null;
  /** "host:port" of the source server */
  readonly sourceBackendServer: string | null;
  readonly targetBackendSetName: string | null;
  /** "host:port" of the target server */
  readonly targetBackendServer: string | null;
}

export interface EntryRebalancingRequestMessage extends AccessLogMessageBase, RebalancingRequestFields {
  readonly messageType: "ENTRY_REBALANCING_REQUEST";
}

export interface EntryRebalancingResultMessage extends AccessLogMessageBase, RebalancingRequestFields {
  readonly messageType: "ENTRY_REBALANCING_RESULT";
  readonly resultCode: ResultCode | null;
  readonly errorMessage: string | null;
  readonly adminActionMessage: string | null;
  readonly sourceAltered: boolean | null;
  readonly targetAltered: boolean | null;
  readonly entriesReadFromSource: number | null;
  readonly entriesAddedToTarget: number | null;
  readonly entriesDeletedFromSource: number | null;
}

function decodeRebalancingRequestFields(accessor: FieldAccessor): RebalancingRequestFields {
  return {
    rebalancingOperationID: accessor.getLong(FIELDS.rebalancingOperationID),
    triggeredByConnectionID: accessor.getLong(FIELDS.triggeredByConnectionID),
    triggeredByOperationID: accessor.getLong(FIELDS.triggeredByOperationID),
    subtreeBaseDN: accessor.getString(FIELDS.baseDN),
    sizeLimit: accessor.getInteger(FIELDS.sizeLimit),
    sourceBackendSetName: accessor.getString(FIELDS.sourceBackendSet),
    sourceBackendServer: decodeEndpoint(accessor, FIELDS.sourceServer),
    targetBackendSetName: accessor.getString(FIELDS.targetBackendSet),
    targetBackendServer: decodeEndpoint(accessor, FIELDS.targetServer),
  };
}

export function decodeEntryRebalancingRequestMessage(accessor: FieldAccessor): EntryRebalancingRequestMessage {
  return frozen({
    ...decodeCommonFields(accessor, "ENTRY_REBALANCING_REQUEST"),
    ...decodeRebalancingRequestFields(accessor),
  });
}

export function decodeEntryRebalancingResultMessage(accessor: FieldAccessor): EntryRebalancingResultMessage {
  return frozen({
    ...decodeCommonFields(accessor, "ENTRY_REBALANCING_RESULT"),
    ...decodeRebalancingRequestFields(accessor),
    resultCode: decodeResultCode(accessor, FIELDS.resultCode, FIELDS.resultCodeName),
    errorMessage: accessor.getString(FIELDS.errorMessage),
    adminActionMessage: accessor.getString(FIELDS.adminActionRequired),
    sourceAltered: accessor.getBoolean(FIELDS.sourceServerAltered),
    targetAltered: accessor.getBoolean(FIELDS.targetServerAltered),
    entriesReadFromSource: accessor.getInteger(FIELDS.entriesReadFromSource),
    entriesAddedToTarget: accessor.getInteger(FIELDS.entriesAddedToTarget),
    entriesDeletedFromSource: accessor.getInteger(FIELDS.entriesDeletedFromSource),
  });
}
