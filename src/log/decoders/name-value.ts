/**
 * Ordered name/value pairs exposed as a map
 *
 * Used for security negotiation properties, origin details and the
 * properties of inter-server request controls.
 */

import type { FieldAccessor } from "../accessor.js";
import { FieldFormatError } from "../errors.js";
import { defineField } from "../fields.js";
import type { FieldDescriptor } from "../fields.js";

const PAIR_FIELDS = {
  name: defineField("name", "string"),
  value: defineField("value", "string"),
} as const;

/**
 * Decode a list of {name, value} objects
 * A later pair with the same name replaces an earlier one
 */
export function decodeNameValuePairs(
  accessor: FieldAccessor,
  field: FieldDescriptor<"objectList">,
  expected: string
): ReadonlyMap<string, string> {
  const pairs = new Map<string, string>();
  for (const pair of accessor.getObjectList(field)) {
    const name = pair.getString(PAIR_FIELDS.name);
    if (name === null) {
      throw new FieldFormatError(pair.qualify(PAIR_FIELDS.name.name), expected, "name is missing");
    }
    pairs.set(name, pair.getString(PAIR_FIELDS.value) ?? "");
  }
  return pairs;
}
