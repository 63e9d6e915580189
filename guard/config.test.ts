/**
 * Configuration tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_CONFIG, loadConfig, resolveConfig, validateConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import type { Logger } from "./types.js";

function fakeLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function writeConfig(content: string): string {
  const dir = mkdtempSync(join(tmpdir(), "privacy-guard-"));
  const path = join(dir, "config.json");
  writeFileSync(path, content);
  return path;
}

afterEach(() => {
  vi.unstubAllEnvs();
});

// =============================================================================
// Defaults
// =============================================================================

describe("resolveConfig", () => {
  it("should have sensible defaults", () => {
    expect(DEFAULT_CONFIG.defaultLanguage).toBe("en");
    expect(DEFAULT_CONFIG.enableRegex).toBe(true);
    expect(DEFAULT_CONFIG.enableNer).toBe(true);
    expect(DEFAULT_CONFIG.nameLabel).toBe("PER");
    expect(DEFAULT_CONFIG.entityLabels.PERSON).toBe("PER");
  });

  it("should resolve empty config to defaults", () => {
    expect(resolveConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("should resolve partial config with defaults", () => {
    const config = resolveConfig({ enableNer: false, nameLabel: null });

    expect(config.enableNer).toBe(false); // overridden
    expect(config.nameLabel).toBeNull(); // overridden
    expect(config.enableRegex).toBe(true); // default
  });

  it("should not share the default label map", () => {
    const config = resolveConfig();
    config.entityLabels.PERSON = "NAME";

    expect(DEFAULT_CONFIG.entityLabels.PERSON).toBe("PER");
  });
});

describe("validateConfig", () => {
  it("should accept the defaults", () => {
    expect(() => validateConfig(resolveConfig())).not.toThrow();
  });

  it("should reject an empty default language", () => {
    expect(() => validateConfig(resolveConfig({ defaultLanguage: "" }))).toThrow(ConfigError);
  });

  it("should reject labels that cannot form a placeholder", () => {
    expect(() => validateConfig(resolveConfig({ entityLabels: { PERSON: "<PER>" } }))).toThrow(
      'Invalid label for entityLabels.PERSON: "<PER>"',
    );
    expect(() => validateConfig(resolveConfig({ nameLabel: "" }))).toThrow('Invalid label for nameLabel: ""');
  });
});

// =============================================================================
// Loading
// =============================================================================

describe("loadConfig", () => {
  it("should load from a config file", () => {
    const path = writeConfig(JSON.stringify({ defaultLanguage: "fr", enableNer: false }));

    const config = loadConfig(path, fakeLogger());

    expect(config.defaultLanguage).toBe("fr");
    expect(config.enableNer).toBe(false);
    expect(config.enableRegex).toBe(true);
  });

  it("should load label maps from a config file", () => {
    const path = writeConfig(JSON.stringify({ entityLabels: { PERSON: "NAME" }, nameLabel: null }));

    const config = loadConfig(path, fakeLogger());

    expect(config.entityLabels).toEqual({ PERSON: "NAME" });
    expect(config.nameLabel).toBeNull();
  });

  it("should fall back to the environment when no file exists", () => {
    vi.stubEnv("PRIVACY_GUARD_DEFAULT_LANGUAGE", "de");
    vi.stubEnv("PRIVACY_GUARD_DISABLE_NER", "true");

    const config = loadConfig(join(tmpdir(), "privacy-guard-missing", "config.json"), fakeLogger());

    expect(config.defaultLanguage).toBe("de");
    expect(config.enableNer).toBe(false);
    expect(config.enableRegex).toBe(true);
  });

  it("should warn and fall back to the environment on invalid JSON", () => {
    vi.stubEnv("PRIVACY_GUARD_DISABLE_REGEX", "1");
    const logger = fakeLogger();
    const path = writeConfig("{ not json");

    const config = loadConfig(path, logger);

    expect(config.enableRegex).toBe(false);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining(`Failed to load config from ${path}`));
  });

  it("should warn on unknown keys and wrong types", () => {
    const logger = fakeLogger();

    loadConfig(writeConfig(JSON.stringify({ port: 8900 })), logger);
    loadConfig(writeConfig(JSON.stringify({ enableNer: "no" })), logger);

    expect(logger.warn).toHaveBeenNthCalledWith(1, expect.stringContaining("Unknown config key: port"));
    expect(logger.warn).toHaveBeenNthCalledWith(2, expect.stringContaining("enableNer must be a boolean"));
  });
});
