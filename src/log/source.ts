/**
 * Record sources: yield one raw record per line of JSON-formatted access log
 */

import { closeSync, openSync, readSync } from "node:fs";
import { StringDecoder } from "node:string_decoder";
import { InvalidOptionError, SourceUnavailableError } from "./errors.js";
import { parseRecordLine } from "./record.js";
import type { RawRecord } from "./types.js";

export interface SourceRecord {
  readonly record: RawRecord;
  /** 1-based line the record was read from */
  readonly lineNumber: number;
}

export interface RecordSource {
  /** Human-readable origin, such as the file path */
  readonly description: string;
  /** Next record, or null once the source is exhausted */
  next(): SourceRecord | null;
  /** Release the underlying resource; called exactly once by the reader */
  close(): void;
}

const DEFAULT_READ_BUFFER_SIZE = 64 * 1024;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base for sources that produce text one line at a time
 * Blank lines are skipped and a trailing carriage return is dropped
 */
abstract class LineRecordSource implements RecordSource {
  abstract readonly description: string;
  private lineNumber = 0;

  protected abstract nextLine(): string | null;

  abstract close(): void;

  next(): SourceRecord | null {
    for (;;) {
      const line = this.nextLine();
      if (line === null) return null;

      this.lineNumber++;
      const text = line.endsWith("\r") ? line.slice(0, -1) : line;
      if (text.trim() === "") continue;

      return { record: parseRecordLine(text, this.lineNumber), lineNumber: this.lineNumber };
    }
  }
}

/** Reads a log file synchronously in fixed-size chunks */
export class FileRecordSource extends LineRecordSource {
  readonly description: string;
  private fd: number | undefined;
  private readonly buffer: Buffer;
  private readonly decoder = new StringDecoder("utf8");
  private readonly lines: string[] = [];
  private pending = "";
  private endOfFile = false;

  constructor(filePath: string, options?: { readBufferSize?: number }) {
    super();
    this.description = filePath;
    const readBufferSize = options?.readBufferSize ?? DEFAULT_READ_BUFFER_SIZE;
    if (!Number.isInteger(readBufferSize) || readBufferSize < 1) {
      throw new InvalidOptionError("readBufferSize", readBufferSize, "Must be a positive integer.");
    }
    this.buffer = Buffer.alloc(readBufferSize);
    try {
      this.fd = openSync(filePath, "r");
    } catch (error) {
      throw new SourceUnavailableError(filePath, describeError(error), { cause: error });
    }
  }

  protected nextLine(): string | null {
    for (;;) {
      const line = this.lines.shift();
      if (line !== undefined) return line;

      if (this.endOfFile) {
        if (this.pending === "") return null;
        const last = this.pending;
        this.pending = "";
        return last;
      }
      this.fill();
    }
  }

  close(): void {
    if (this.fd === undefined) return;
    const fd = this.fd;
    this.fd = undefined;
    try {
      closeSync(fd);
    } catch (error) {
      throw new SourceUnavailableError(this.description, describeError(error), { cause: error });
    }
  }

  private fill(): void {
    if (this.fd === undefined) {
      throw new SourceUnavailableError(this.description, "source is closed");
    }

    let bytesRead: number;
    try {
      bytesRead = readSync(this.fd, this.buffer, 0, this.buffer.length, null);
    } catch (error) {
      throw new SourceUnavailableError(this.description, describeError(error), { cause: error });
    }

    if (bytesRead === 0) {
      this.endOfFile = true;
      this.pending += this.decoder.end();
      return;
    }

    const parts = (this.pending + this.decoder.write(this.buffer.subarray(0, bytesRead))).split("\n");
    this.pending = parts.pop() ?? "";
    for (const part of parts) {
      this.lines.push(part);
    }
  }
}

/** Serves records from text already in memory */
export class StringRecordSource extends LineRecordSource {
  readonly description: string;
  private readonly lines: string[];
  private index = 0;

  constructor(text: string | readonly string[], description = "memory") {
    super();
    this.description = description;
    this.lines = typeof text === "string" ? text.split("\n") : [...text];
  }

  protected nextLine(): string | null {
    if (this.index >= this.lines.length) return null;
    return this.lines[this.index++];
  }

  close(): void {
    this.index = this.lines.length;
  }
}
