/**
 * Extended operation fields
 */

import type { FieldAccessor } from "../accessor.js";
import { FIELDS } from "../fields.js";

export interface ExtendedRequestFields {
  readonly requestOID: string | null;
  /** Human-readable name of the request, when the server knows it */
  readonly requestType: string | null;
}

export interface ExtendedResultFields {
  readonly responseOID: string | null;
  readonly responseType: string | null;
}

export function decodeExtendedRequestFields(accessor: FieldAccessor): ExtendedRequestFields {
  return {
    requestOID: accessor.getString(FIELDS.requestOID),
    requestType: accessor.getString(FIELDS.requestType),
  };
}

export function decodeExtendedResultFields(accessor: FieldAccessor): ExtendedResultFields {
  return {
    responseOID: accessor.getString(FIELDS.responseOID),
    responseType: accessor.getString(FIELDS.responseType),
  };
}
