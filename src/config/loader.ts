/**
 * Configuration loader for access-log-decoder
 * Handles YAML parsing, merging with defaults, and validation
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import type { Config, LoadedConfig, LoggingConfig, RawConfig, RawSection, ReaderConfig } from "./types.js";

// Valid log levels
const VALID_LOG_LEVELS = new Set<string>(["debug", "info", "warn", "error"]);

const KNOWN_SECTIONS: Record<string, readonly string[]> = {
  reader: ["maxControlDepth", "resumeAfterError", "readBufferSize"],
  logging: ["level", "file"],
};

/** Default configuration values */
export const DEFAULT_CONFIG: Config = {
  reader: {
    maxControlDepth: 16,
    resumeAfterError: false,
    readBufferSize: 64 * 1024,
  },
  logging: {
    level: "info",
  },
};

function isLogLevel(value: string): value is LoggingConfig["level"] {
  return VALID_LOG_LEVELS.has(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Load configuration from a YAML file
 * A missing file yields the defaults; a file that does not parse is an error
 */
export async function loadConfig(filePath?: string): Promise<LoadedConfig> {
  let raw: RawConfig = {};

  if (filePath !== undefined && existsSync(filePath)) {
    let parsed: unknown;
    try {
      const content = await readFile(filePath, "utf-8");
      parsed = parseYaml(content);
    } catch (error) {
      throw new Error(`Failed to parse config file at ${filePath}: ${error}`, { cause: error });
    }
    if (parsed !== null && parsed !== undefined) {
      if (!isPlainObject(parsed)) {
        throw new Error(`Invalid config file at ${filePath}: top level must be a mapping`);
      }
      raw = parsed;
    }
  }

  return mergeAndValidateConfig(raw);
}

/**
 * Merge raw config with defaults and validate
 */
export function mergeAndValidateConfig(raw: RawConfig): LoadedConfig {
  const warnings = collectUnknownKeys(raw);

  const config: Config = {
    reader: mergeReaderConfig(sectionOf(raw, "reader")),
    logging: mergeLoggingConfig(sectionOf(raw, "logging")),
  };

  return { config, warnings };
}

function sectionOf(raw: RawConfig, name: string): RawSection {
  const section = raw[name];
  return isPlainObject(section) ? section : {};
}

function collectUnknownKeys(raw: RawConfig): string[] {
  const warnings: string[] = [];
  for (const [section, value] of Object.entries(raw)) {
    const knownKeys = KNOWN_SECTIONS[section];
    if (!knownKeys) {
      warnings.push(`Unknown config section "${section}" is ignored.`);
      continue;
    }
    if (value === null || value === undefined) {
      continue;
    }
    if (!isPlainObject(value)) {
      throw new Error(`Invalid ${section}: must be a mapping, got ${Array.isArray(value) ? "array" : typeof value}`);
    }
    for (const key of Object.keys(value)) {
      if (!knownKeys.includes(key)) {
        warnings.push(`Unknown config key "${section}.${key}" is ignored.`);
      }
    }
  }
  return warnings;
}

function integerSetting(
  name: string,
  rawValue: unknown,
  defaultValue: number,
  min: number,
  max: number
): number {
  if (rawValue === undefined || rawValue === null) {
    return defaultValue;
  }
  if (typeof rawValue !== "number" || !Number.isInteger(rawValue)) {
    throw new Error(`Invalid ${name}: ${String(rawValue)}. Must be an integer.`);
  }
  if (rawValue < min || rawValue > max) {
    throw new Error(`Invalid ${name}: ${rawValue}. Must be between ${min} and ${max}.`);
  }
  return rawValue;
}

function mergeReaderConfig(raw: RawSection): ReaderConfig {
  const maxControlDepth = integerSetting(
    "reader.maxControlDepth",
    raw.maxControlDepth,
    DEFAULT_CONFIG.reader.maxControlDepth,
    1,
    256
  );

  const readBufferSize = integerSetting(
    "reader.readBufferSize",
    raw.readBufferSize,
    DEFAULT_CONFIG.reader.readBufferSize,
    1024,
    16 * 1024 * 1024
  );

  const rawResume = raw.resumeAfterError;
  if (rawResume !== undefined && rawResume !== null && typeof rawResume !== "boolean") {
    throw new Error(`Invalid reader.resumeAfterError: ${String(rawResume)}. Must be true or false.`);
  }

  return {
    maxControlDepth,
    resumeAfterError: typeof rawResume === "boolean" ? rawResume : DEFAULT_CONFIG.reader.resumeAfterError,
    readBufferSize,
  };
}

function mergeLoggingConfig(raw: RawSection): LoggingConfig {
  const level = raw.level ?? DEFAULT_CONFIG.logging.level;

  if (typeof level !== "string" || !isLogLevel(level)) {
    throw new Error(
      `Invalid logging level: ${String(level)}. Must be one of: ${Array.from(VALID_LOG_LEVELS).join(", ")}`
    );
  }

  const file = raw.file;
  if (file !== undefined && file !== null && (typeof file !== "string" || file.length === 0)) {
    throw new Error(`Invalid logging.file: must be a non-empty string.`);
  }

  return typeof file === "string" ? { level, file } : { level };
}
