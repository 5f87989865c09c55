/**
 * Intermediate response fields
 */

import type { FieldAccessor } from "../accessor.js";
import { FIELDS } from "../fields.js";

export interface IntermediateResponseFields {
  readonly oid: string | null;
  /** Name of the response type, when the server knows it */
  readonly name: string | null;
  /** String rendering of the response value */
  readonly value: string | null;
  readonly responseControlOIDs: ReadonlySet<string>;
}

export function decodeIntermediateResponseFields(accessor: FieldAccessor): IntermediateResponseFields {
  return {
    oid: accessor.getString(FIELDS.oid),
    name: accessor.getString(FIELDS.name),
    value: accessor.getString(FIELDS.value),
    responseControlOIDs: accessor.getStringSet(FIELDS.responseControlOIDs),
  };
}
