/**
 * Entry rebalancing endpoint decoding
 */

import type { FieldAccessor } from "../accessor.js";
import { defineField } from "../fields.js";
import type { FieldDescriptor } from "../fields.js";

const ENDPOINT_FIELDS = {
  address: defineField("address", "string"),
  port: defineField("port", "integer"),
} as const;

/** Render a {address, port} object as "host:port", or the bare address without a port */
export function decodeEndpoint(accessor: FieldAccessor, field: FieldDescriptor<"object">): string | null {
  const endpoint = accessor.getObject(field);
  if (!endpoint) return null;

  const address = endpoint.getString(ENDPOINT_FIELDS.address);
  if (address === null) return null;

  const port = endpoint.getInteger(ENDPOINT_FIELDS.port);
  return port === null ? address : `${address}:${port}`;
}
