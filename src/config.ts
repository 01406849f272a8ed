// src/config.ts — Config Resolver

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import type { Diagnostic, ResolvedConfig } from "./types.js";
import { JAVASCRIPT_EXTENSIONS, PYTHON_EXTENSIONS, TYPESCRIPT_EXTENSIONS } from "./types.js";
import { configFileSchema, type ConfigFile } from "./schemas.js";
import { DEFAULT_RULE_TABLES } from "./role-classifier.js";
import { DEFAULT_FLOW_LEXICON } from "./flow-chains.js";

export const CONFIG_FILE_NAME = "source-atlas.config.json";
export const PACKAGE_JSON_KEY = "sourceAtlas";

export const DEFAULTS: ResolvedConfig = {
  include: [],
  exclude: [],
  extensions: [...PYTHON_EXTENSIONS, ...TYPESCRIPT_EXTENSIONS, ...JAVASCRIPT_EXTENSIONS],
  concurrency: 8,
  maxChainDepth: 4,
  maxChainsPerEntry: 10,
  maxChains: 200,
  highComplexityThreshold: 10,
  verbose: false,
  rules: DEFAULT_RULE_TABLES,
  flowLexicon: DEFAULT_FLOW_LEXICON,
};

export interface ConfigSources {
  /** Explicit config file; skips the search */
  configPath?: string;
  /** Directory searched for a config file (default: process.cwd()) */
  cwd?: string;
  /** Set false to use defaults and overrides only */
  search?: boolean;
}

/**
 * Resolve config. Later sources win: defaults ← config file ← overrides.
 * An unreadable or invalid file is reported and ignored.
 */
export function resolveConfig(
  overrides: Partial<ResolvedConfig> = {},
  diagnostics: Diagnostic[] = [],
  sources: ConfigSources = {},
): ResolvedConfig {
  const fileConfig = loadConfigFile(sources, diagnostics) ?? {};
  const config: ResolvedConfig = { ...DEFAULTS };
  assignDefined(config, fileConfig);
  assignDefined(config, overrides);
  return config;
}

const CONFIG_KEYS: readonly (keyof ResolvedConfig)[] = [
  "include",
  "exclude",
  "extensions",
  "concurrency",
  "maxChainDepth",
  "maxChainsPerEntry",
  "maxChains",
  "highComplexityThreshold",
  "verbose",
  "rules",
  "flowLexicon",
];

function assignDefined(target: ResolvedConfig, source: Partial<ResolvedConfig>): void {
  for (const key of CONFIG_KEYS) setKey(target, source, key);
}

function setKey<K extends keyof ResolvedConfig>(
  target: ResolvedConfig,
  source: Partial<ResolvedConfig>,
  key: K,
): void {
  const value = source[key];
  if (value !== undefined) target[key] = value;
}

function loadConfigFile(sources: ConfigSources, diagnostics: Diagnostic[]): ConfigFile | null {
  if (sources.configPath) {
    const absPath = resolve(sources.configPath);
    if (!existsSync(absPath)) {
      diagnostics.push({
        level: "warn",
        kind: "Config",
        module: "config",
        message: `Config file not found: ${sources.configPath}`,
      });
      return null;
    }
    return parseConfig(absPath, readJson(absPath, diagnostics), diagnostics);
  }

  if (sources.search === false) return null;
  const cwd = sources.cwd ?? process.cwd();

  const jsonConfig = join(cwd, CONFIG_FILE_NAME);
  if (existsSync(jsonConfig)) {
    return parseConfig(jsonConfig, readJson(jsonConfig, diagnostics), diagnostics);
  }

  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    const pkg = readJson(pkgJson, diagnostics);
    if (typeof pkg === "object" && pkg !== null && PACKAGE_JSON_KEY in pkg) {
      const section: unknown = Reflect.get(pkg, PACKAGE_JSON_KEY);
      return parseConfig(`${pkgJson}#${PACKAGE_JSON_KEY}`, section, diagnostics);
    }
  }

  return null;
}

function readJson(filePath: string, diagnostics: Diagnostic[]): unknown {
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    return parsed;
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    diagnostics.push({
      level: "warn",
      kind: "Config",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return undefined;
  }
}

function parseConfig(label: string, raw: unknown, diagnostics: Diagnostic[]): ConfigFile | null {
  if (raw === undefined) return null;
  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    diagnostics.push({
      level: "warn",
      kind: "Config",
      module: "config",
      message: `Invalid config in ${label}: ${issues}`,
    });
    return null;
  }
  return result.data;
}
