/**
 * Configuration types for access-log-decoder
 */

/** Access log reader configuration */
export interface ReaderConfig {
  /** Maximum nesting of embedded intermediate client controls */
  maxControlDepth: number;
  /** Continue with the next line after a decoding failure instead of failing the reader */
  resumeAfterError: boolean;
  /** Bytes requested from the file per read */
  readBufferSize: number;
}

/** Logging configuration */
export interface LoggingConfig {
  level: "debug" | "info" | "warn" | "error";
  /** Optional JSONL file to append log entries to */
  file?: string;
}

/** Complete configuration structure */
export interface Config {
  reader: ReaderConfig;
  logging: LoggingConfig;
}

/** Result of loading a configuration file */
export interface LoadedConfig {
  config: Config;
  warnings: string[];
}

/** Raw parsed YAML structure (before validation) */
export type RawConfig = Record<string, unknown>;

/** One raw YAML section, keyed by setting name */
export type RawSection = Record<string, unknown>;
