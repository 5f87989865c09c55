/**
 * Error taxonomy for access log decoding
 */

export type AccessLogErrorCode =
  | "SOURCE_UNAVAILABLE"
  | "MALFORMED_RECORD"
  | "MISSING_REQUIRED_FIELD"
  | "INVALID_ENUM_VALUE"
  | "ILLEGAL_COMBINATION"
  | "FIELD_FORMAT"
  | "INVALID_OPTION"
  | "READER_CLOSED"
  | "READER_FAILED";

/** Base class for every error the decoder raises */
export abstract class AccessLogError extends Error {
  abstract readonly code: AccessLogErrorCode;

  /** 1-based line the error was found on, when read from a source */
  lineNumber: number | undefined;

  constructor(message: string, options?: { cause?: unknown; lineNumber?: number }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AccessLogError";
    this.lineNumber = options?.lineNumber;
  }
}

/** The underlying byte source could not be opened or read */
export class SourceUnavailableError extends AccessLogError {
  readonly code = "SOURCE_UNAVAILABLE";

  constructor(
    public readonly source: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Access log source ${source} is unavailable: ${reason}`, options);
    this.name = "SourceUnavailableError";
  }
}

/** A line is not a well-formed JSON object */
export class MalformedRecordError extends AccessLogError {
  readonly code = "MALFORMED_RECORD";

  constructor(reason: string, options?: { cause?: unknown; lineNumber?: number }) {
    super(`Malformed access log record: ${reason}`, options);
    this.name = "MalformedRecordError";
  }
}

/** A field every record of its kind must carry is absent */
export class MissingRequiredFieldError extends AccessLogError {
  readonly code = "MISSING_REQUIRED_FIELD";

  constructor(public readonly field: string) {
    super(`Access log record is missing required field "${field}"`);
    this.name = "MissingRequiredFieldError";
  }
}

/** The message type or operation type token is not recognized */
export class InvalidEnumValueError extends AccessLogError {
  readonly code = "INVALID_ENUM_VALUE";

  constructor(
    public readonly field: string,
    public readonly value: string
  ) {
    super(`Access log record field "${field}" has unrecognized value "${value}"`);
    this.name = "InvalidEnumValueError";
  }
}

/** The message type and operation type pair is not legal */
export class IllegalCombinationError extends AccessLogError {
  readonly code = "ILLEGAL_COMBINATION";

  constructor(
    public readonly messageType: string,
    public readonly operationType: string
  ) {
    super(`Message type ${messageType} is not allowed for operation type ${operationType}`);
    this.name = "IllegalCombinationError";
  }
}

/** A present field has the wrong kind or fails a post-parse check */
export class FieldFormatError extends AccessLogError {
  readonly code = "FIELD_FORMAT";

  constructor(
    public readonly field: string,
    public readonly expected: string,
    detail?: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Access log record field "${field}" is not a valid ${expected}${detail ? `: ${detail}` : ""}`,
      options
    );
    this.name = "FieldFormatError";
  }
}

/** A reader or decoder option is outside its allowed range */
export class InvalidOptionError extends AccessLogError {
  readonly code = "INVALID_OPTION";

  constructor(
    public readonly option: string,
    value: unknown,
    requirement: string
  ) {
    super(`Invalid ${option}: ${String(value)}. ${requirement}`);
    this.name = "InvalidOptionError";
  }
}

/** A read was attempted after the reader was closed */
export class ReaderClosedError extends AccessLogError {
  readonly code = "READER_CLOSED";

  constructor() {
    super("Access log reader is closed");
    this.name = "ReaderClosedError";
  }
}

/** A read was attempted after an earlier failure left the reader unusable */
export class ReaderFailedError extends AccessLogError {
  readonly code = "READER_FAILED";

  constructor(cause: unknown) {
    super("Access log reader failed on an earlier record and cannot continue", { cause });
    this.name = "ReaderFailedError";
  }
}
