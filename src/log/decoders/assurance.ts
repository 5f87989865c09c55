/**
 * Assured replication decoding: requested levels and per-server outcomes
 */

import type { FieldAccessor } from "../accessor.js";
import { FieldFormatError } from "../errors.js";
import { defineField } from "../fields.js";
import type { FieldDescriptor } from "../fields.js";

export const LOCAL_ASSURANCE_LEVELS = ["NONE", "RECEIVED_ANY_SERVER", "PROCESSED_ALL_SERVERS"] as const;
export type LocalAssuranceLevel = (typeof LOCAL_ASSURANCE_LEVELS)[number];

export const REMOTE_ASSURANCE_LEVELS = [
  "NONE",
  "RECEIVED_ANY_REMOTE_LOCATION",
  "RECEIVED_ALL_REMOTE_LOCATIONS",
  "PROCESSED_ALL_REMOTE_SERVERS",
] as const;
export type RemoteAssuranceLevel = (typeof REMOTE_ASSURANCE_LEVELS)[number];

export const SERVER_ASSURANCE_RESULT_CODES = [
  "COMPLETE",
  "TIMEOUT",
  "CONFLICT",
  "SERVER_SHUTDOWN",
  "UNAVAILABLE",
  "DUPLICATE",
] as const;
export type ServerAssuranceResultCode = (typeof SERVER_ASSURANCE_RESULT_CODES)[number];

/** Assurance the client requested and the server applied to a write */
export interface AssuredReplicationRequirements {
  readonly localLevel: LocalAssuranceLevel | null;
  readonly remoteLevel: RemoteAssuranceLevel | null;
  readonly timeoutMillis: number | null;
  readonly responseDelayedByAssurance: boolean | null;
  /** Whether a request control overrode the server's default requirements */
  readonly alteredByRequestControl: boolean | null;
}

/** Outcome of assurance for one replica */
export interface ServerAssuranceResult {
  readonly resultCode: ServerAssuranceResultCode | null;
  readonly replicationServerID: number | null;
  readonly replicaID: number | null;
}

const REQUIREMENT_FIELDS = {
  localAssuranceLevel: defineField("localAssuranceLevel", "string"),
  remoteAssuranceLevel: defineField("remoteAssuranceLevel", "string"),
  assuranceTimeoutMillis: defineField("assuranceTimeoutMillis", "long"),
  responseDelayedByAssurance: defineField("responseDelayedByAssurance", "boolean"),
  alteredByRequestControl: defineField("alteredByRequestControl", "boolean"),
} as const;

const SERVER_RESULT_FIELDS = {
  resultCode: defineField("resultCode", "string"),
  replicationServerID: defineField("replicationServerID", "integer"),
  replicaID: defineField("replicaID", "integer"),
} as const;

function enumValue<T extends string>(
  accessor: FieldAccessor,
  field: FieldDescriptor<"string">,
  allowed: readonly T[],
  expected: string
): T | null {
  const value = accessor.getString(field);
  if (value === null) return null;
  const normalized = value.trim().toUpperCase().replace(/-/g, "_");
  const match = allowed.find((candidate) => candidate === normalized);
  if (match === undefined) {
    throw new FieldFormatError(accessor.qualify(field.name), expected, `"${value}" is not recognized`);
  }
  return match;
}

export function decodeAssuredReplicationRequirements(
  accessor: FieldAccessor,
  field: FieldDescriptor<"object">
): AssuredReplicationRequirements | null {
  const requirements = accessor.getObject(field);
  if (!requirements) return null;

  const f = REQUIREMENT_FIELDS;
  return Object.freeze({
    localLevel: enumValue(requirements, f.localAssuranceLevel, LOCAL_ASSURANCE_LEVELS, "local assurance level"),
    remoteLevel: enumValue(requirements, f.remoteAssuranceLevel, REMOTE_ASSURANCE_LEVELS, "remote assurance level"),
    timeoutMillis: requirements.getLong(f.assuranceTimeoutMillis),
    responseDelayedByAssurance: requirements.getBoolean(f.responseDelayedByAssurance),
    alteredByRequestControl: requirements.getBoolean(f.alteredByRequestControl),
  });
}

export function decodeServerAssuranceResults(
  accessor: FieldAccessor,
  field: FieldDescriptor<"objectList">
): readonly ServerAssuranceResult[] {
  const f = SERVER_RESULT_FIELDS;
  return Object.freeze(
    accessor.getObjectList(field).map((result) =>
      Object.freeze({
        resultCode: enumValue(result, f.resultCode, SERVER_ASSURANCE_RESULT_CODES, "assurance result code"),
        replicationServerID: result.getInteger(f.replicationServerID),
        replicaID: result.getInteger(f.replicaID),
      })
    )
  );
}
