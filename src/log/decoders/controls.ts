/**
 * Embedded request and response control decoding
 *
 * Intermediate client controls may embed another control of the same kind
 * for the next hop. Nesting is bounded by the context's maxControlDepth.
 */

import type { FieldAccessor } from "../accessor.js";
import type { DecodeContext } from "../context.js";
import { FieldFormatError } from "../errors.js";
import { defineField } from "../fields.js";
import type { FieldDescriptor } from "../fields.js";
import { decodeNameValuePairs } from "./name-value.js";

export interface IntermediateClientRequestControl {
  readonly downstreamClientAddress: string | null;
  readonly downstreamClientSecure: boolean | null;
  readonly clientIdentity: string | null;
  readonly clientName: string | null;
  readonly clientSessionID: string | null;
  readonly clientRequestID: string | null;
  /** Control the downstream client received from its own client */
  readonly downstreamRequest: IntermediateClientRequestControl | null;
}

export interface IntermediateClientResponseControl {
  readonly upstreamServerAddress: string | null;
  readonly upstreamServerSecure: boolean | null;
  readonly serverName: string | null;
  readonly serverSessionID: string | null;
  readonly serverResponseID: string | null;
  /** Control the upstream server received from its own server */
  readonly upstreamResponse: IntermediateClientResponseControl | null;
}

export interface OperationPurposeRequestControl {
  readonly applicationName: string | null;
  readonly applicationVersion: string | null;
  readonly codeLocation: string | null;
  readonly requestPurpose: string | null;
}

/** Control one server component attached to a request it sent to another */
export interface InterServerRequestControl {
  readonly componentName: string | null;
  readonly operationPurpose: string | null;
  readonly properties: ReadonlyMap<string, string>;
}

const REQUEST_CONTROL_FIELDS = {
  downstreamClientAddress: defineField("downstreamClientAddress", "string"),
  downstreamClientSecure: defineField("downstreamClientSecure", "boolean"),
  clientIdentity: defineField("clientIdentity", "string"),
  clientName: defineField("clientName", "string"),
  clientSessionID: defineField("clientSessionID", "string"),
  clientRequestID: defineField("clientRequestID", "string"),
  downstreamRequest: defineField("downstreamRequest", "object"),
} as const;

const RESPONSE_CONTROL_FIELDS = {
  upstreamServerAddress: defineField("upstreamServerAddress", "string"),
  upstreamServerSecure: defineField("upstreamServerSecure", "boolean"),
  serverName: defineField("serverName", "string"),
  serverSessionID: defineField("serverSessionID", "string"),
  serverResponseID: defineField("serverResponseID", "string"),
  upstreamResponse: defineField("upstreamResponse", "object"),
} as const;

const PURPOSE_CONTROL_FIELDS = {
  applicationName: defineField("applicationName", "string"),
  applicationVersion: defineField("applicationVersion", "string"),
  codeLocation: defineField("codeLocation", "string"),
  requestPurpose: defineField("requestPurpose", "string"),
} as const;

const INTER_SERVER_CONTROL_FIELDS = {
  componentName: defineField("componentName", "string"),
  operationPurpose: defineField("operationPurpose", "string"),
  properties: defineField("properties", "objectList"),
} as const;

function checkDepth(accessor: FieldAccessor, nested: FieldDescriptor, depth: number, ctx: DecodeContext): void {
  if (depth > ctx.maxControlDepth) {
    throw new FieldFormatError(
      accessor.qualify(nested.name),
      "control",
      `nesting exceeds the maximum depth of ${ctx.maxControlDepth}`
    );
  }
}

function decodeRequestControlAt(
  accessor: FieldAccessor,
  ctx: DecodeContext,
  depth: number
): IntermediateClientRequestControl {
  const f = REQUEST_CONTROL_FIELDS;
  const nested = accessor.getObject(f.downstreamRequest);
  if (nested) checkDepth(accessor, f.downstreamRequest, depth + 1, ctx);

  return Object.freeze({
    downstreamClientAddress: accessor.getString(f.downstreamClientAddress),
    downstreamClientSecure: accessor.getBoolean(f.downstreamClientSecure),
    clientIdentity: accessor.getString(f.clientIdentity),
    clientName: accessor.getString(f.clientName),
    clientSessionID: accessor.getString(f.clientSessionID),
    clientRequestID: accessor.getString(f.clientRequestID),
    downstreamRequest: nested ? decodeRequestControlAt(nested, ctx, depth + 1) : null,
  });
}

function decodeResponseControlAt(
  accessor: FieldAccessor,
  ctx: DecodeContext,
  depth: number
): IntermediateClientResponseControl {
  const f = RESPONSE_CONTROL_FIELDS;
  const nested = accessor.getObject(f.upstreamResponse);
  if (nested) checkDepth(accessor, f.upstreamResponse, depth + 1, ctx);

  return Object.freeze({
    upstreamServerAddress: accessor.getString(f.upstreamServerAddress),
    upstreamServerSecure: accessor.getBoolean(f.upstreamServerSecure),
    serverName: accessor.getString(f.serverName),
    serverSessionID: accessor.getString(f.serverSessionID),
    serverResponseID: accessor.getString(f.serverResponseID),
    upstreamResponse: nested ? decodeResponseControlAt(nested, ctx, depth + 1) : null,
  });
}

export function decodeIntermediateClientRequestControl(
  accessor: FieldAccessor,
  field: FieldDescriptor<"object">,
  ctx: DecodeContext
): IntermediateClientRequestControl | null {
  const control = accessor.getObject(field);
  return control ? decodeRequestControlAt(control, ctx, 1) : null;
}

export function decodeIntermediateClientResponseControl(
  accessor: FieldAccessor,
  field: FieldDescriptor<"object">,
  ctx: DecodeContext
): IntermediateClientResponseControl | null {
  const control = accessor.getObject(field);
  return control ? decodeResponseControlAt(control, ctx, 1) : null;
}

export function decodeOperationPurposeRequestControl(
  accessor: FieldAccessor,
  field: FieldDescriptor<"object">
): OperationPurposeRequestControl | null {
  const control = accessor.getObject(field);
  if (!control) return null;

  const f = PURPOSE_CONTROL_FIELDS;
  return Object.freeze({
    applicationName: control.getString(f.applicationName),
    applicationVersion: control.getString(f.applicationVersion),
    codeLocation: control.getString(f.codeLocation),
    requestPurpose: control.getString(f.requestPurpose),
  });
}

export function decodeInterServerRequestControls(
  accessor: FieldAccessor,
  field: FieldDescriptor<"objectList">
): readonly InterServerRequestControl[] {
  const f = INTER_SERVER_CONTROL_FIELDS;
  return Object.freeze(
    accessor.getObjectList(field).map((control) =>
      Object.freeze({
        componentName: control.getString(f.componentName),
        operationPurpose: control.getString(f.operationPurpose),
        properties: decodeNameValuePairs(control, f.properties, "inter-server request property"),
      })
    )
  );
}
