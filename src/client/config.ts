/**
 * Environment configuration
 *
 * | Variable               | Option                  |
 * |------------------------|-------------------------|
 * | `GRAPH_ENDPOINTS`      | `endpoints` (comma-separated) |
 * | `GRAPH_API_KEY`        | `apiKey`                |
 * | `GRAPH_BEARER_TOKEN`   | `bearerToken`           |
 * | `GRAPH_TLS`            | `tls` (`true`/`false`)  |
 * | `GRAPH_TIMEOUT_MS`     | `timeoutMs`             |
 * | `GRAPH_RETRY_MAX`      | `retry.maxRetries`      |
 * | `GRAPH_RETRY_BASE_MS`  | `retry.baseDelayMs`     |
 * | `GRAPH_RETRY_MAX_MS`   | `retry.maxDelayMs`      |
 * | `GRAPH_RETRY_JITTER`   | `retry.jitterFactor`    |
 * | `GRAPH_LOG_LEVEL`      | logging level           |
 */

import { ConfigurationError } from '../errors/index.js';
import { configureLogging, parseLogLevel, type LogLevel } from '../observability/index.js';
import { validateRetryConfig, type RetryOptions } from '../rpc/retry.js';
import type { ClientOptions } from './types.js';

/**
 * Environment variables as found on `process.env`
 */
export type GraphEnv = Readonly<Record<string, string | undefined>>;

function readString(env: GraphEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readNumber(env: GraphEnv, name: string): number | undefined {
  const raw = readString(env, name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`, {
      details: { variable: name, value: raw },
    });
  }
  return value;
}

function readBoolean(env: GraphEnv, name: string): boolean | undefined {
  const raw = readString(env, name)?.toLowerCase();
  switch (raw) {
    case undefined:
      return undefined;
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigurationError(`${name} must be true or false, got "${raw}"`, {
        details: { variable: name, value: raw },
      });
  }
}

function readRetry(env: GraphEnv): RetryOptions | undefined {
  const retry: RetryOptions = {};
  const maxRetries = readNumber(env, 'GRAPH_RETRY_MAX');
  const baseDelayMs = readNumber(env, 'GRAPH_RETRY_BASE_MS');
  const maxDelayMs = readNumber(env, 'GRAPH_RETRY_MAX_MS');
  const jitterFactor = readNumber(env, 'GRAPH_RETRY_JITTER');

  if (maxRetries !== undefined) retry.maxRetries = maxRetries;
  if (baseDelayMs !== undefined) retry.baseDelayMs = baseDelayMs;
  if (maxDelayMs !== undefined) retry.maxDelayMs = maxDelayMs;
  if (jitterFactor !== undefined) retry.jitterFactor = jitterFactor;

  if (Object.keys(retry).length === 0) {
    return undefined;
  }
  validateRetryConfig(retry);
  return retry;
}

/**
 * Build client options from environment variables. Unset variables leave the
 * option unset.
 *
 * @throws ConfigurationError for malformed numbers or booleans, or an invalid retry policy
 *
 * @example
 * ```typescript
 * const client = createGraphClient(loadClientOptionsFromEnv(process.env));
 * ```
 */
export function loadClientOptionsFromEnv(env: GraphEnv = process.env): ClientOptions {
  const options: ClientOptions = {};

  const endpoints = readString(env, 'GRAPH_ENDPOINTS')
    ?.split(',')
    .map((endpoint) => endpoint.trim())
    .filter((endpoint) => endpoint.length > 0);
  if (endpoints && endpoints.length > 0) {
    options.endpoints = endpoints;
  }

  const apiKey = readString(env, 'GRAPH_API_KEY');
  if (apiKey !== undefined) options.apiKey = apiKey;

  const bearerToken = readString(env, 'GRAPH_BEARER_TOKEN');
  if (bearerToken !== undefined) options.bearerToken = bearerToken;

  const tls = readBoolean(env, 'GRAPH_TLS');
  if (tls !== undefined) options.tls = tls;

  const timeoutMs = readNumber(env, 'GRAPH_TIMEOUT_MS');
  if (timeoutMs !== undefined) options.timeoutMs = timeoutMs;

  const retry = readRetry(env);
  if (retry !== undefined) options.retry = retry;

  return options;
}

/**
 * The log level named by `GRAPH_LOG_LEVEL`, if any.
 *
 * @throws ConfigurationError for an unknown level name
 */
export function loadLogLevelFromEnv(env: GraphEnv = process.env): LogLevel | undefined {
  const raw = readString(env, 'GRAPH_LOG_LEVEL');
  if (raw === undefined) {
    return undefined;
  }
  const level = parseLogLevel(raw);
  if (!level) {
    throw new ConfigurationError(
      `GRAPH_LOG_LEVEL must be one of debug, info, warn, error, silent, got "${raw}"`,
      { details: { variable: 'GRAPH_LOG_LEVEL', value: raw } }
    );
  }
  return level;
}

/**
 * Apply `GRAPH_LOG_LEVEL` to the logging configuration and return the client
 * options from the environment.
 */
export function configureFromEnv(env: GraphEnv = process.env): ClientOptions {
  const level = loadLogLevelFromEnv(env);
  if (level !== undefined) {
    configureLogging({ level });
  }
  return loadClientOptionsFromEnv(env);
}
