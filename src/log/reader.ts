/**
 * Access log reader: pulls records from a source and decodes them one at a time
 *
 * States: open -> exhausted | failed, and any state -> closed.
 * The source is released once, on exhaustion, on failure or on close.
 */

import type { ReaderConfig } from "../config/types.js";
import type { ChildLogger, Logger } from "../utils/logger.js";
import { createDecodeContext } from "./context.js";
import { decodeAccessLogRecord } from "./discriminator.js";
import { AccessLogError, ReaderClosedError, ReaderFailedError, SourceUnavailableError } from "./errors.js";
import type { AccessLogMessage } from "./messages/index.js";
import { FileRecordSource } from "./source.js";
import type { RecordSource } from "./source.js";

export type ReaderState = "open" | "exhausted" | "failed" | "closed";

export interface AccessLogReaderOptions extends Partial<ReaderConfig> {
  logger?: Logger | ChildLogger;
}

/** Errors that concern one record and leave the source readable */
function isRecordError(error: unknown): error is AccessLogError {
  return error instanceof AccessLogError && !(error instanceof SourceUnavailableError);
}

export class AccessLogReader {
  private readonly source: RecordSource;
  private readonly resumeAfterError: boolean;
  private readonly maxControlDepth: number;
  private readonly log: ChildLogger | undefined;
  private currentState: ReaderState = "open";
  private released = false;
  private failure: unknown;

  constructor(source: RecordSource, options?: AccessLogReaderOptions) {
    this.source = source;
    this.resumeAfterError = options?.resumeAfterError ?? false;
    // The reader owns the source from here on, even when its options are rejected
    try {
      this.maxControlDepth = createDecodeContext({ maxControlDepth: options?.maxControlDepth }).maxControlDepth;
    } catch (error) {
      source.close();
      throw error;
    }
    this.log = options?.logger?.child({ component: "reader", source: source.description });
    this.log?.debug("Opened access log");
  }

  get state(): ReaderState {
    return this.currentState;
  }

  /**
   * Read and decode the next message
   * Returns null once the log is exhausted
   */
  readMessage(): AccessLogMessage | null {
    switch (this.currentState) {
      case "closed":
        throw new ReaderClosedError();
      case "failed":
        throw new ReaderFailedError(this.failure);
      case "exhausted":
        return null;
      case "open":
        break;
    }

    let lineNumber: number | undefined;
    try {
      const next = this.source.next();
      if (next === null) {
        this.currentState = "exhausted";
        this.log?.debug("Reached end of access log");
        this.release();
        return null;
      }

      lineNumber = next.lineNumber;
      const message = decodeAccessLogRecord(next.record, {
        maxControlDepth: this.maxControlDepth,
        logger: this.log?.child({ component: "decoder", lineNumber }),
      });

      if (this.log?.isLevelEnabled("debug")) {
        this.log.debug("Decoded message", {
          lineNumber,
          messageType: message.messageType,
          operationType: "operationType" in message ? message.operationType : undefined,
        });
      }
      return message;
    } catch (error) {
      if (error instanceof AccessLogError && error.lineNumber === undefined) {
        error.lineNumber = lineNumber;
      }
      this.handleFailure(error);
      throw error;
    }
  }

  /** Iterate over the remaining messages */
  *messages(): Generator<AccessLogMessage, void, undefined> {
    for (;;) {
      const message = this.readMessage();
      if (message === null) return;
      yield message;
    }
  }

  [Symbol.iterator](): Generator<AccessLogMessage, void, undefined> {
    return this.messages();
  }

  /** Release the source; valid in every state */
  close(): void {
    if (this.currentState === "closed") return;
    this.currentState = "closed";
    this.log?.debug("Closed access log");
    this.release();
  }

  private handleFailure(error: unknown): void {
    const fields = {
      errorCode: error instanceof AccessLogError ? error.code : undefined,
      lineNumber: error instanceof AccessLogError ? error.lineNumber : undefined,
    };
    const reason = error instanceof Error ? error.message : String(error);

    if (this.resumeAfterError && isRecordError(error)) {
      this.log?.warn(`Skipping undecodable record: ${reason}`, fields);
      return;
    }

    this.currentState = "failed";
    this.failure = error;
    this.release();
    this.log?.error(`Access log reader failed: ${reason}`, fields);
  }

  private release(): void {
    if (this.released) return;
    this.released = true;
    this.source.close();
  }
}

/** Open a reader over a log file path or an existing record source */
export function openAccessLog(source: string | RecordSource, options?: AccessLogReaderOptions): AccessLogReader {
  const recordSource =
    typeof source === "string" ? new FileRecordSource(source, { readBufferSize: options?.readBufferSize }) : source;
  return new AccessLogReader(recordSource, options);
}

/** Open a reader, run fn with it, and close it on every exit path */
export function withAccessLogReader<T>(
  source: string | RecordSource,
  fn: (reader: AccessLogReader) => T,
  options?: AccessLogReaderOptions
): T {
  const reader = openAccessLog(source, options);
  try {
    return fn(reader);
  } finally {
    reader.close();
  }
}
