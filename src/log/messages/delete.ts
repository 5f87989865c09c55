/**
 * Delete operation fields
 */

import type { FieldAccessor } from "../accessor.js";
import { FIELDS } from "../fields.js";

export interface DeleteRequestFields {
  readonly dn: string | null;
}

/** Set when the server soft-deleted the entry instead of removing it */
export interface DeleteResultFields {
  readonly softDeletedEntryDN: string | null;
  readonly changeToSoftDeletedEntry: boolean | null;
}

export function decodeDeleteRequestFields(accessor: FieldAccessor): DeleteRequestFields {
  return { dn: accessor.getString(FIELDS.dn) };
}

export function decodeDeleteResultFields(accessor: FieldAccessor): DeleteResultFields {
  return {
    softDeletedEntryDN: accessor.getString(FIELDS.softDeletedEntryDN),
    changeToSoftDeletedEntry: accessor.getBoolean(FIELDS.changeToSoftDeletedEntry),
  };
}
