/**
 * Add operation fields
 */

import type { FieldAccessor } from "../accessor.js";
import { FIELDS } from "../fields.js";

export interface AddRequestFields {
  readonly dn: string | null;
  /** DN of the soft-deleted entry an undelete request restores */
  readonly undeleteFromDN: string | null;
}

export function decodeAddRequestFields(accessor: FieldAccessor): AddRequestFields {
  return {
    dn: accessor.getString(FIELDS.dn),
    undeleteFromDN: accessor.getString(FIELDS.undeleteFromDN),
  };
}
