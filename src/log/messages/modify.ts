/**
 * Modify operation fields
 */

import type { FieldAccessor } from "../accessor.js";
import { FIELDS } from "../fields.js";

export interface ModifyRequestFields {
  readonly dn: string | null;
  /** Names of the modified attributes, in request order */
  readonly attributeNames: readonly string[];
}

export function decodeModifyRequestFields(accessor: FieldAccessor): ModifyRequestFields {
  return {
    dn: accessor.getString(FIELDS.dn),
    attributeNames: accessor.getStringList(FIELDS.attributes),
  };
}
