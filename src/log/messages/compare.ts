/**
 * Compare operation fields
 */

import type { FieldAccessor } from "../accessor.js";
import { FIELDS } from "../fields.js";

export interface CompareRequestFields {
  readonly dn: string | null;
  readonly attributeName: string | null;
  readonly assertionValue: string | null;
}

export function decodeCompareRequestFields(accessor: FieldAccessor): CompareRequestFields {
  return {
    dn: accessor.getString(FIELDS.dn),
    attributeName: accessor.getString(FIELDS.attr),
    assertionValue: accessor.getString(FIELDS.assertionValue),
  };
}
