/**
 * Modify DN operation fields
 */

import type { FieldAccessor } from "../accessor.js";
import { FIELDS } from "../fields.js";

export interface ModifyDNRequestFields {
  readonly dn: string | null;
  readonly newRDN: string | null;
  readonly deleteOldRDN: boolean | null;
  readonly newSuperiorDN: string | null;
}

export function decodeModifyDNRequestFields(accessor: FieldAccessor): ModifyDNRequestFields {
  return {
    dn: accessor.getString(FIELDS.dn),
    newRDN: accessor.getString(FIELDS.newRDN),
    deleteOldRDN: accessor.getBoolean(FIELDS.deleteOldRDN),
    newSuperiorDN: accessor.getString(FIELDS.newSuperior),
  };
}
