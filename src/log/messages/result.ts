/**
 * Result fields shared across operation types
 */

import type { FieldAccessor } from "../accessor.js";
import type { DecodeContext } from "../context.js";
import { decodeAssuredReplicationRequirements, decodeServerAssuranceResults } from "../decoders/assurance.js";
import type { AssuredReplicationRequirements, ServerAssuranceResult } from "../decoders/assurance.js";
import { decodeIntermediateClientResponseControl } from "../decoders/controls.js";
import type { IntermediateClientResponseControl } from "../decoders/controls.js";
import { decodeResultCode } from "../decoders/result-code.js";
import type { ResultCode } from "../decoders/result-code.js";
import { FIELDS } from "../fields.js";

/** Carried by every result and assurance completion message */
export interface CommonResultFields {
  readonly resultCode: ResultCode | null;
  readonly diagnosticMessage: string | null;
  readonly additionalInformation: string | null;
  readonly matchedDN: string | null;
  readonly referralURLs: readonly string[];
  readonly serversAccessed: readonly string[];
  readonly uncachedDataAccessed: boolean | null;
  readonly workQueueWaitTimeMillis: number | null;
  readonly processingTimeMillis: number | null;
  readonly intermediateResponsesReturned: number | null;
  readonly responseControlOIDs: ReadonlySet<string>;
  readonly usedPrivileges: ReadonlySet<string>;
  readonly preAuthorizationUsedPrivileges: ReadonlySet<string>;
  readonly missingPrivileges: ReadonlySet<string>;
  readonly intermediateClientResponseControl: IntermediateClientResponseControl | null;
}

/** Results of operations that may be processed under an alternate authorization identity */
export interface AuthorizedResultFields {
  readonly alternateAuthorizationDN: string | null;
}

/** Index usage reported for operations that read entries through indexes */
export interface IndexAccessResultFields {
  readonly indexesWithKeysAccessedNearEntryLimit: ReadonlySet<string>;
  readonly indexesWithKeysAccessedExceedingEntryLimit: ReadonlySet<string>;
}

/** Results of add, delete, modify and modify DN operations */
export interface MutatingResultFields extends AuthorizedResultFields, IndexAccessResultFields {
  readonly replicationChangeID: string | null;
  readonly assuredReplication: AssuredReplicationRequirements | null;
}

/** Outcome of assured replication, logged once assurance completes */
export interface AssuranceCompletionFields {
  readonly localAssuranceSatisfied: boolean | null;
  readonly remoteAssuranceSatisfied: boolean | null;
  readonly serverAssuranceResults: readonly ServerAssuranceResult[];
}

/** Why forwarding a request to a backend failed */
export interface ForwardFailureFields {
  readonly resultCode: ResultCode | null;
  readonly diagnosticMessage: string | null;
}

export function decodeCommonResultFields(accessor: FieldAccessor, ctx: DecodeContext): CommonResultFields {
  return {
    resultCode: decodeResultCode(accessor, FIELDS.resultCode, FIELDS.resultCodeName),
    diagnosticMessage: accessor.getString(FIELDS.message),
    additionalInformation: accessor.getString(FIELDS.additionalInfo),
    matchedDN: accessor.getString(FIELDS.matchedDN),
    referralURLs: accessor.getStringList(FIELDS.referralURLs),
    serversAccessed: accessor.getStringList(FIELDS.serversAccessed),
    uncachedDataAccessed: accessor.getBoolean(FIELDS.uncachedDataAccessed),
    workQueueWaitTimeMillis: accessor.getDouble(FIELDS.workQueueWaitTimeMillis),
    processingTimeMillis: accessor.getDouble(FIELDS.processingTimeMillis),
    intermediateResponsesReturned: accessor.getLong(FIELDS.intermediateResponsesReturned),
    responseControlOIDs: accessor.getStringSet(FIELDS.responseControlOIDs),
    usedPrivileges: accessor.getStringSet(FIELDS.usedPrivileges),
    preAuthorizationUsedPrivileges: accessor.getStringSet(FIELDS.preAuthorizationUsedPrivileges),
    missingPrivileges: accessor.getStringSet(FIELDS.missingPrivileges),
    intermediateClientResponseControl: decodeIntermediateClientResponseControl(
      accessor,
      FIELDS.intermediateClientResponseControl,
      ctx
    ),
  };
}

export function decodeAuthorizedResultFields(accessor: FieldAccessor): AuthorizedResultFields {
  return { alternateAuthorizationDN: accessor.getString(FIELDS.authorizationDN) };
}

export function decodeIndexAccessResultFields(accessor: FieldAccessor): IndexAccessResultFields {
  return {
    indexesWithKeysAccessedNearEntryLimit: accessor.getStringSet(FIELDS.indexesWithKeysAccessedNearEntryLimit),
    indexesWithKeysAccessedExceedingEntryLimit: accessor.getStringSet(
      FIELDS.indexesWithKeysAccessedExceedingEntryLimit
    ),
  };
}

export function decodeMutatingResultFields(accessor: FieldAccessor): MutatingResultFields {
  return {
    ...decodeAuthorizedResultFields(accessor),
    ...decodeIndexAccessResultFields(accessor),
    replicationChangeID: accessor.getString(FIELDS.replicationChangeID),
    assuredReplication: decodeAssuredReplicationRequirements(accessor, FIELDS.assuredReplicationRequirements),
  };
}

export function decodeAssuranceCompletionFields(accessor: FieldAccessor): AssuranceCompletionFields {
  return {
    localAssuranceSatisfied: accessor.getBoolean(FIELDS.localAssuranceSatisfied),
    remoteAssuranceSatisfied: accessor.getBoolean(FIELDS.remoteAssuranceSatisfied),
    serverAssuranceResults: decodeServerAssuranceResults(accessor, FIELDS.serverAssuranceResults),
  };
}

export function decodeForwardFailureFields(accessor: FieldAccessor): ForwardFailureFields {
  return {
    resultCode: decodeResultCode(accessor, FIELDS.resultCode, FIELDS.resultCodeName),
    diagnosticMessage: accessor.getString(FIELDS.message),
  };
}
