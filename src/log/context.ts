/**
 * Options and context shared by the message decoders
 */

import type { ChildLogger } from "../utils/logger.js";
import { InvalidOptionError } from "./errors.js";

/** Logger surface the decoders report through */
export type DecodeLogger = Pick<ChildLogger, "debug" | "warn">;

export interface DecodeOptions {
  /** Maximum nesting of embedded intermediate client controls (default 16) */
  maxControlDepth?: number;
  logger?: DecodeLogger;
}

export interface DecodeContext {
  readonly maxControlDepth: number;
  readonly logger: DecodeLogger | undefined;
}

export const DEFAULT_MAX_CONTROL_DEPTH = 16;

export function createDecodeContext(options?: DecodeOptions): DecodeContext {
  const maxControlDepth = options?.maxControlDepth ?? DEFAULT_MAX_CONTROL_DEPTH;
  if (!Number.isInteger(maxControlDepth) || maxControlDepth < 1) {
    throw new InvalidOptionError("maxControlDepth", maxControlDepth, "Must be a positive integer.");
  }
  return { maxControlDepth, logger: options?.logger };
}
