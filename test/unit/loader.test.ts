/**
 * Unit tests for configuration loader
 * Tests reader/logging config merging and validation
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { DEFAULT_CONFIG, loadConfig, mergeAndValidateConfig } from "../../src/config/loader.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "access-log-decoder-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const file = join(dir, "config.yml");
    writeFileSync(file, content);
    return file;
  }

  describe("defaults", () => {
    it("uses defaults when no config file exists", async () => {
      const { config, warnings } = await loadConfig("/nonexistent/path/config.yml");

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(warnings).toEqual([]);
    });

    it("uses defaults when no path is given", async () => {
      const { config } = await loadConfig();

      expect(config.reader.maxControlDepth).toBe(16);
      expect(config.reader.resumeAfterError).toBe(false);
      expect(config.reader.readBufferSize).toBe(65536);
      expect(config.logging.level).toBe("info");
    });

    it("treats an empty file as defaults", async () => {
      const { config } = await loadConfig(writeConfig(""));

      expect(config).toEqual(DEFAULT_CONFIG);
    });
  });

  describe("merging", () => {
    it("overrides reader and logging settings from YAML", async () => {
      const file = writeConfig(
        [
          "reader:",
          "  maxControlDepth: 4",
          "  resumeAfterError: true",
          "  readBufferSize: 4096",
          "logging:",
          "  level: debug",
          "  file: /tmp/decoder.jsonl",
        ].join("\n")
      );

      const { config } = await loadConfig(file);

      expect(config.reader).toEqual({ maxControlDepth: 4, resumeAfterError: true, readBufferSize: 4096 });
      expect(config.logging).toEqual({ level: "debug", file: "/tmp/decoder.jsonl" });
    });

    it("keeps defaults for settings a section leaves out", async () => {
      const { config } = await loadConfig(writeConfig("reader:\n  resumeAfterError: true\n"));

      expect(config.reader.maxControlDepth).toBe(16);
      expect(config.reader.resumeAfterError).toBe(true);
    });
  });

  describe("validation", () => {
    it("rejects a top level that is not a mapping", async () => {
      await expect(loadConfig(writeConfig("- one\n- two\n"))).rejects.toThrow("top level must be a mapping");
    });

    it("rejects YAML that does not parse", async () => {
      await expect(loadConfig(writeConfig("reader: [unclosed\n"))).rejects.toThrow("Failed to parse config file");
    });

    it("rejects a non-integer maxControlDepth", () => {
      expect(() => mergeAndValidateConfig({ reader: { maxControlDepth: 2.5 } })).toThrow(
        "Invalid reader.maxControlDepth: 2.5. Must be an integer."
      );
    });

    it("rejects an out-of-range maxControlDepth", () => {
      expect(() => mergeAndValidateConfig({ reader: { maxControlDepth: 0 } })).toThrow(
        "Invalid reader.maxControlDepth: 0. Must be between 1 and 256."
      );
    });

    it("rejects an out-of-range readBufferSize", () => {
      expect(() => mergeAndValidateConfig({ reader: { readBufferSize: 16 } })).toThrow(
        "Invalid reader.readBufferSize: 16. Must be between 1024 and 16777216."
      );
    });

    it("rejects a non-boolean resumeAfterError", () => {
      expect(() => mergeAndValidateConfig({ reader: { resumeAfterError: "yes" } })).toThrow(
        "Invalid reader.resumeAfterError: yes. Must be true or false."
      );
    });

    it("rejects an unknown logging level", () => {
      expect(() => mergeAndValidateConfig({ logging: { level: "trace" } })).toThrow(
        "Invalid logging level: trace. Must be one of: debug, info, warn, error"
      );
    });

    it("rejects an empty logging file", () => {
      expect(() => mergeAndValidateConfig({ logging: { file: "" } })).toThrow(
        "Invalid logging.file: must be a non-empty string."
      );
    });

    it("rejects a section that is not a mapping", () => {
      expect(() => mergeAndValidateConfig({ reader: 5 })).toThrow("Invalid reader: must be a mapping, got number");
    });
  });

  describe("warnings", () => {
    it("warns about unknown sections and keys", () => {
      const { warnings } = mergeAndValidateConfig({
        reader: { maxDepth: 3 },
        server: { port: 1 },
      });

      expect(warnings).toEqual([
        'Unknown config key "reader.maxDepth" is ignored.',
        'Unknown config section "server" is ignored.',
      ]);
    });
  });
});
