import { readFileSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";

import { Value } from "@sinclair/typebox/value";

import { ConfigError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import { AppConfigSchema, type AppConfig } from "./schema.js";

export { AppConfigSchema, type AppConfig } from "./schema.js";

export interface LoadConfigOptions {
  /** QR images are skipped, so links need no base URL */
  allowMissingBaseUrl?: boolean;
}

const PATH_KEYS = [
  "inputPath",
  "hashPath",
  "idMapPath",
  "siteRoot",
  "outputRoot",
  "outboxRoot",
] as const;

/**
 * Apply defaults, validate and cross-check a raw config object.
 * Every problem is reported at once.
 */
export function parseConfig(
  raw: unknown,
  source: string,
  options: LoadConfigOptions = {}
): AppConfig {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigError(source, ["config must be a JSON object"]);
  }

  const value = Value.Default(AppConfigSchema, structuredClone(raw));
  if (!Value.Check(AppConfigSchema, value)) {
    const problems = [...Value.Errors(AppConfigSchema, value)].map(
      (error) => `${error.path === "" ? "/" : error.path}: ${error.message}`
    );
    throw new ConfigError(source, problems);
  }

  const problems: string[] = [];
  if (value.clinicsSource === "url" && value.clinicsUrl.trim() === "") {
    problems.push("clinicsUrl is required when clinicsSource is 'url'");
  }
  if (
    value.analyticsProvider === "ga4" &&
    value.ga4MeasurementId.trim() === ""
  ) {
    problems.push("ga4MeasurementId is required when analyticsProvider is 'ga4'");
  }
  if (value.baseUrl.trim() === "" && options.allowMissingBaseUrl !== true) {
    problems.push("baseUrl is required unless QR generation is skipped");
  }
  if (problems.length > 0) {
    throw new ConfigError(source, problems);
  }

  return value;
}

/**
 * Load a JSON config file. Relative paths inside it resolve against the
 * directory of the file.
 */
export function loadConfig(
  path: string,
  options: LoadConfigOptions = {}
): AppConfig {
  const configPath = resolve(path);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf8"));
  } catch (error) {
    throw new ConfigError(configPath, [
      `cannot read config: ${errorMessage(error)}`,
    ]);
  }

  const config = resolveConfigPaths(
    parseConfig(raw, configPath, options),
    dirname(configPath)
  );
  logger.debug({ configPath, year: config.year }, "Config loaded");
  return config;
}

export function resolveConfigPaths(config: AppConfig, baseDir: string): AppConfig {
  const resolved = { ...config };
  for (const key of PATH_KEYS) {
    const value = resolved[key];
    resolved[key] = isAbsolute(value) ? value : resolve(baseDir, value);
  }
  return resolved;
}
