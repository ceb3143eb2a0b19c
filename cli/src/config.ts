/**
 * Configuration loading and validation
 *
 * Settings come from {dataDir}/config.json, overridden by the environment.
 * Credentials are only read from the environment.
 */

import * as fs from "fs";
import * as path from "path";
import {
  HIERARCHY_PRESETS,
  PARENT_LINK_TYPES,
  parseHierarchy,
  isValidationError,
  type Config,
  type CrawlMode,
  type HierarchyConfig,
  type HierarchyPreset,
  type StorageBackend,
} from "@treecrawl/types";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "@treecrawl/integration-jira";
import { DEFAULT_CRAWL_CONCURRENCY } from "./crawler/engine.js";
import { ConfigError } from "./errors.js";

export const DEFAULT_DATA_DIR = ".treecrawl";
export const DEFAULT_MODE: CrawlMode = "delta";

const VALID_MODES = ["full", "delta"] as const;
const VALID_BACKENDS = ["sqlite", "files"] as const;
const VALID_PRESETS = ["management", "full"] as const;
const KNOWN_KEYS = ["jira", "crawl", "storage", "failureLog", "hierarchy"];

/**
 * Result of validating a configuration file
 */
export interface ValidationResult {
  /** Whether the configuration is valid (no errors) */
  valid: boolean;
  /** Configuration problems that must be fixed */
  errors: string[];
  /** Potential issues; the configuration is still usable */
  warnings: string[];
}

/**
 * Fully resolved settings with defaults applied and paths made absolute
 */
export interface ResolvedConfig {
  dataDir: string;
  jira: {
    baseUrl: string | null;
    token: string | null;
    requestTimeoutMs: number;
    parentLinkTypes: string[];
  };
  crawl: {
    mode: CrawlMode;
    concurrency: number;
    maxAgeMs: number | null;
  };
  storage: {
    backend: StorageBackend;
    dbPath: string;
    issuesDir: string;
  };
  failureLog: string;
  hierarchy: HierarchyConfig;
}

export type Env = Record<string, string | undefined>;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some((candidate) => candidate === value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Check the shape of a parsed config.json and collect the usable parts
 */
function parseConfig(raw: unknown, errors: string[], warnings: string[]): Config {
  const config: Config = {};
  if (!isObject(raw)) {
    errors.push("config must be a JSON object");
    return config;
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.includes(key)) {
      warnings.push(`unknown setting "${key}" is ignored`);
    }
  }

  if (raw.jira !== undefined) {
    if (!isObject(raw.jira)) {
      errors.push("jira must be an object");
    } else {
      const { baseUrl, requestTimeoutMs, parentLinkTypes } = raw.jira;
      config.jira = {};
      if (baseUrl !== undefined) {
        if (typeof baseUrl === "string" && /^https?:\/\//.test(baseUrl)) {
          config.jira.baseUrl = baseUrl;
        } else {
          errors.push("jira.baseUrl must be an http(s) URL");
        }
      }
      if (requestTimeoutMs !== undefined) {
        if (isPositiveInteger(requestTimeoutMs)) {
          config.jira.requestTimeoutMs = requestTimeoutMs;
        } else {
          errors.push("jira.requestTimeoutMs must be a positive integer");
        }
      }
      if (parentLinkTypes !== undefined) {
        if (isStringList(parentLinkTypes)) {
          config.jira.parentLinkTypes = parentLinkTypes;
        } else {
          errors.push("jira.parentLinkTypes must be a list of issue types");
        }
      }
      if ("token" in raw.jira) {
        warnings.push("jira.token is ignored; set JIRA_ACCESS_TOKEN instead");
      }
    }
  }

  if (raw.crawl !== undefined) {
    if (!isObject(raw.crawl)) {
      errors.push("crawl must be an object");
    } else {
      const { mode, concurrency, maxAgeMs } = raw.crawl;
      config.crawl = {};
      if (mode !== undefined) {
        if (isOneOf(VALID_MODES, mode)) {
          config.crawl.mode = mode;
        } else {
          errors.push(`crawl.mode must be one of: ${VALID_MODES.join(", ")}`);
        }
      }
      if (concurrency !== undefined) {
        if (isPositiveInteger(concurrency)) {
          config.crawl.concurrency = concurrency;
          if (concurrency > 16) {
            warnings.push("crawl.concurrency above 16 may hit Jira rate limits");
          }
        } else {
          errors.push("crawl.concurrency must be a positive integer");
        }
      }
      if (maxAgeMs !== undefined) {
        if (isPositiveInteger(maxAgeMs)) {
          config.crawl.maxAgeMs = maxAgeMs;
        } else {
          errors.push("crawl.maxAgeMs must be a positive integer");
        }
      }
    }
  }

  if (raw.storage !== undefined) {
    if (!isObject(raw.storage)) {
      errors.push("storage must be an object");
    } else {
      const { backend, dbPath, issuesDir } = raw.storage;
      config.storage = {};
      if (backend !== undefined) {
        if (isOneOf(VALID_BACKENDS, backend)) {
          config.storage.backend = backend;
        } else {
          errors.push(`storage.backend must be one of: ${VALID_BACKENDS.join(", ")}`);
        }
      }
      if (dbPath !== undefined) {
        if (typeof dbPath === "string" && dbPath !== "") {
          config.storage.dbPath = dbPath;
          if (backend === "files") {
            warnings.push("storage.dbPath is unused with the files backend");
          }
        } else {
          errors.push("storage.dbPath must be a non-empty string");
        }
      }
      if (issuesDir !== undefined) {
        if (typeof issuesDir === "string" && issuesDir !== "") {
          config.storage.issuesDir = issuesDir;
        } else {
          errors.push("storage.issuesDir must be a non-empty string");
        }
      }
    }
  }

  if (raw.failureLog !== undefined) {
    if (typeof raw.failureLog === "string" && raw.failureLog !== "") {
      config.failureLog = raw.failureLog;
    } else {
      errors.push("failureLog must be a non-empty string");
    }
  }

  if (raw.hierarchy !== undefined) {
    const hierarchy = raw.hierarchy;
    if (typeof hierarchy === "string") {
      if (isOneOf(VALID_PRESETS, hierarchy)) {
        config.hierarchy = hierarchy;
      } else {
        errors.push(`hierarchy must be one of: ${VALID_PRESETS.join(", ")}, or a map`);
      }
    } else if (isObject(hierarchy)) {
      try {
        config.hierarchy = parseHierarchy(hierarchy);
      } catch (error) {
        if (!isValidationError(error)) {
          throw error;
        }
        errors.push(`hierarchy: ${error.message}`);
      }
    } else {
      errors.push("hierarchy must be a preset name or a map of issue type to relation kinds");
    }
  }

  return config;
}

/**
 * Validate a parsed configuration object
 *
 * @example
 * ```typescript
 * const result = validateConfig({ crawl: { mode: "fast" } });
 * // result.errors: ["crawl.mode must be one of: full, delta"]
 * ```
 */
export function validateConfig(raw: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  parseConfig(raw, errors, warnings);
  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Read {dataDir}/config.json. A missing file yields an empty config.
 */
export function readConfigFile(dataDir: string): unknown {
  const configPath = path.join(dataDir, "config.json");
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const content = fs.readFileSync(configPath, "utf8");
  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`${configPath} is not valid JSON: ${reason}`, "config.json");
  }
}

export function resolveHierarchy(
  value: HierarchyPreset | Record<string, string[]> | undefined
): HierarchyConfig {
  if (value === undefined) {
    return HIERARCHY_PRESETS.full;
  }
  if (typeof value === "string") {
    return HIERARCHY_PRESETS[value];
  }
  return parseHierarchy(value);
}

function parseEnvMode(env: Env): CrawlMode | undefined {
  const value = env.TREECRAWL_MODE;
  if (value === undefined || value === "") {
    return undefined;
  }
  if (!isOneOf(VALID_MODES, value)) {
    throw new ConfigError(
      `TREECRAWL_MODE must be one of: ${VALID_MODES.join(", ")}`,
      "TREECRAWL_MODE"
    );
  }
  return value;
}

function parseEnvConcurrency(env: Env): number | undefined {
  const value = env.TREECRAWL_CONCURRENCY;
  if (value === undefined || value === "") {
    return undefined;
  }
  const parsed = Number(value);
  if (!isPositiveInteger(parsed)) {
    throw new ConfigError(
      "TREECRAWL_CONCURRENCY must be a positive integer",
      "TREECRAWL_CONCURRENCY"
    );
  }
  return parsed;
}

/**
 * Load, validate and resolve the configuration for a data directory
 *
 * @throws ConfigError when config.json or the environment is invalid
 */
export function loadConfig(dataDir: string, env: Env = process.env): ResolvedConfig {
  const root = path.resolve(dataDir);
  const errors: string[] = [];
  const warnings: string[] = [];
  const config = parseConfig(readConfigFile(root), errors, warnings);

  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration:\n  ${errors.join("\n  ")}`);
  }
  for (const warning of warnings) {
    console.warn(`[config] ${warning}`);
  }

  const inDataDir = (value: string | undefined, fallback: string) =>
    path.resolve(root, value ?? fallback);

  return {
    dataDir: root,
    jira: {
      baseUrl: env.JIRA_BASE_URL || config.jira?.baseUrl || null,
      token: env.JIRA_ACCESS_TOKEN || null,
      requestTimeoutMs: config.jira?.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      parentLinkTypes: config.jira?.parentLinkTypes ?? PARENT_LINK_TYPES,
    },
    crawl: {
      mode: parseEnvMode(env) ?? config.crawl?.mode ?? DEFAULT_MODE,
      concurrency:
        parseEnvConcurrency(env) ?? config.crawl?.concurrency ?? DEFAULT_CRAWL_CONCURRENCY,
      maxAgeMs: config.crawl?.maxAgeMs ?? null,
    },
    storage: {
      backend: config.storage?.backend ?? "sqlite",
      dbPath: inDataDir(config.storage?.dbPath, "cache.db"),
      issuesDir: inDataDir(config.storage?.issuesDir, "issues"),
    },
    failureLog: inDataDir(config.failureLog, "failed_issues.log"),
    hierarchy: resolveHierarchy(config.hierarchy),
  };
}

/**
 * Credentials for network commands
 *
 * @throws ConfigError when the server URL or token is missing
 */
export function requireJiraCredentials(config: ResolvedConfig): {
  baseUrl: string;
  token: string;
} {
  const { baseUrl, token } = config.jira;
  if (!baseUrl) {
    throw new ConfigError(
      "Jira server URL is not set (JIRA_BASE_URL or jira.baseUrl)",
      "JIRA_BASE_URL"
    );
  }
  if (!token) {
    throw new ConfigError("JIRA_ACCESS_TOKEN is not set", "JIRA_ACCESS_TOKEN");
  }
  return { baseUrl, token };
}
