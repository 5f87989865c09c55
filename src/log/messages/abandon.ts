/**
 * Abandon operation fields
 */

import type { FieldAccessor } from "../accessor.js";
import { FIELDS } from "../fields.js";

export interface AbandonRequestFields {
  /** Message ID of the operation the client asked to abandon */
  readonly idToAbandon: number | null;
}

export function decodeAbandonRequestFields(accessor: FieldAccessor): AbandonRequestFields {
  return { idToAbandon: accessor.getInteger(FIELDS.idToAbandon) };
}
