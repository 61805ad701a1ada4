/**
 * Application configuration.
 *
 * Values come from the environment (a .env file is loaded first), then from
 * command-line overrides, and are validated before a run starts.
 */

import {
  ConfigError,
  maybeEnv,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
  type Env,
} from "./env.js";
import { isLogLevel, type LogLevel } from "../logging/index.js";
import {
  DEFAULT_FETCH_SETTINGS,
  loadFetchSettings,
  type FetchSettings,
} from "./fetch/index.js";

export { ConfigError, type Env } from "./env.js";
export * from "./fetch/index.js";

export interface AppConfig {
  readonly logLevel: LogLevel;
  /** Mirror log lines into <logDir>/paperfetch.log */
  readonly logToFile: boolean;
  readonly logDir: string;
  /** YAML or JSON file holding the records */
  readonly recordsFile: string;
  readonly fetch: Readonly<FetchSettings>;
}

/**
 * Command-line values that take precedence over the environment.
 */
export interface ConfigOverrides {
  recordsFile?: string;
  storeRoot?: string;
  concurrency?: number;
  cookieFile?: string;
  verifyPdf?: boolean;
}

/**
 * Load and validate configuration.
 *
 * @throws ConfigError for unparseable environment values
 * @throws FetchSettingsError for values outside their allowed range
 */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): AppConfig {
  const logLevel = optionalEnv("LOG_LEVEL", "info", env);
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${logLevel}. Must be debug, info, warn, or error.`
    );
  }

  const defaults = DEFAULT_FETCH_SETTINGS;
  const fetch = loadFetchSettings({
    storeRoot: overrides.storeRoot ?? optionalEnv("STORE_ROOT", defaults.storeRoot, env),
    concurrency: overrides.concurrency ?? optionalEnvInt("CONCURRENCY", defaults.concurrency, env),
    cookieFile: overrides.cookieFile ?? maybeEnv("COOKIE_FILE", env) ?? defaults.cookieFile,
    userAgent: optionalEnv("USER_AGENT", defaults.userAgent, env),
    fallbackReferer: optionalEnv("FALLBACK_REFERER", defaults.fallbackReferer, env),
    publisherReferer: optionalEnv("PUBLISHER_REFERER", defaults.publisherReferer, env),
    fallbackUserAgent: optionalEnv("FALLBACK_USER_AGENT", defaults.fallbackUserAgent, env),
    requestTimeoutMs: optionalEnvInt("REQUEST_TIMEOUT_MS", defaults.requestTimeoutMs, env),
    maxRedirects: optionalEnvInt("MAX_REDIRECTS", defaults.maxRedirects, env),
    verifyPdf: overrides.verifyPdf ?? optionalEnvBool("VERIFY_PDF", defaults.verifyPdf, env),
  });

  return Object.freeze({
    logLevel,
    logToFile: optionalEnvBool("LOG_TO_FILE", false, env),
    logDir: optionalEnv("LOG_DIR", "logs", env),
    recordsFile: overrides.recordsFile ?? optionalEnv("PAPERS_FILE", "papers.yml", env),
    fetch,
  });
}
