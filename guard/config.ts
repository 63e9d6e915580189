/**
 * Guard configuration management
 */

import { readFileSync, existsSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { Logger } from "./types.js";
import { ConfigError } from "./errors.js";
import { createLogger } from "./logger.js";
import { DEFAULT_ENTITY_LABELS } from "./detectors/wink.js";

export type PrivacyGuardConfig = {
  /** Language used when a call names none, and the NER fallback */
  defaultLanguage: string;
  enableRegex: boolean;
  enableNer: boolean;
  /** NER entity type -> span label */
  entityLabels: Record<string, string>;
  /** Label for heuristic person names; null disables the heuristic */
  nameLabel: string | null;
};

export const DEFAULT_CONFIG_PATH = join(homedir(), ".privacy-guard", "config.json");

export const DEFAULT_CONFIG: PrivacyGuardConfig = {
  defaultLanguage: "en",
  enableRegex: true,
  enableNer: true,
  entityLabels: DEFAULT_ENTITY_LABELS,
  nameLabel: "PER",
};

export function resolveConfig(config?: Partial<PrivacyGuardConfig>): PrivacyGuardConfig {
  return {
    defaultLanguage: config?.defaultLanguage ?? DEFAULT_CONFIG.defaultLanguage,
    enableRegex: config?.enableRegex ?? DEFAULT_CONFIG.enableRegex,
    enableNer: config?.enableNer ?? DEFAULT_CONFIG.enableNer,
    entityLabels: config?.entityLabels ?? { ...DEFAULT_CONFIG.entityLabels },
    nameLabel: config?.nameLabel === undefined ? DEFAULT_CONFIG.nameLabel : config.nameLabel,
  };
}

/**
 * Load configuration from file or environment
 */
export function loadConfig(configPath?: string, logger: Logger = createLogger()): PrivacyGuardConfig {
  const path = configPath || DEFAULT_CONFIG_PATH;

  // Try to load from file
  if (existsSync(path)) {
    try {
      const fileContent = readFileSync(path, "utf-8");
      return resolveConfig(parseFileConfig(JSON.parse(fileContent)));
    } catch (error) {
      logger.warn(
        `Failed to load config from ${path}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  // Load from environment variables
  return loadFromEnv();
}

function isTruthyFlag(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}

function loadFromEnv(): PrivacyGuardConfig {
  const config = resolveConfig();

  if (process.env.PRIVACY_GUARD_DEFAULT_LANGUAGE) {
    config.defaultLanguage = process.env.PRIVACY_GUARD_DEFAULT_LANGUAGE;
  }
  if (isTruthyFlag(process.env.PRIVACY_GUARD_DISABLE_NER)) {
    config.enableNer = false;
  }
  if (isTruthyFlag(process.env.PRIVACY_GUARD_DISABLE_REGEX)) {
    config.enableRegex = false;
  }

  return config;
}

/**
 * Pick known fields from a parsed config file, rejecting wrong types
 */
function parseFileConfig(value: unknown): Partial<PrivacyGuardConfig> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    throw new ConfigError("Config file must contain a JSON object");
  }

  const config: Partial<PrivacyGuardConfig> = {};
  const entries: Array<[string, unknown]> = Object.entries(value);
  for (const [key, field] of entries) {
    switch (key) {
      case "defaultLanguage":
        if (typeof field !== "string") throw new ConfigError("defaultLanguage must be a string");
        config.defaultLanguage = field;
        break;
      case "enableRegex":
      case "enableNer":
        if (typeof field !== "boolean") throw new ConfigError(`${key} must be a boolean`);
        config[key] = field;
        break;
      case "entityLabels":
        config.entityLabels = parseLabelMap(field);
        break;
      case "nameLabel":
        if (field !== null && typeof field !== "string") {
          throw new ConfigError("nameLabel must be a string or null");
        }
        config.nameLabel = typeof field === "string" ? field : null;
        break;
      default:
        throw new ConfigError(`Unknown config key: ${key}`);
    }
  }
  return config;
}

function parseLabelMap(value: unknown): Record<string, string> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    throw new ConfigError("entityLabels must be an object");
  }
  const labels: Record<string, string> = {};
  const entries: Array<[string, unknown]> = Object.entries(value);
  for (const [type, label] of entries) {
    if (typeof label !== "string") throw new ConfigError(`entityLabels.${type} must be a string`);
    labels[type] = label;
  }
  return labels;
}

const INVALID_LABEL_PATTERN = /[<>]/;

function checkLabel(label: string, field: string): void {
  if (label.length === 0 || INVALID_LABEL_PATTERN.test(label)) {
    throw new ConfigError(`Invalid label for ${field}: "${label}"`);
  }
}

/**
 * Validate configuration
 */
export function validateConfig(config: PrivacyGuardConfig): void {
  if (!config.defaultLanguage) {
    throw new ConfigError("defaultLanguage must not be empty");
  }
  for (const [type, label] of Object.entries(config.entityLabels)) {
    checkLabel(label, `entityLabels.${type}`);
  }
  if (config.nameLabel !== null) {
    checkLabel(config.nameLabel, "nameLabel");
  }
}
