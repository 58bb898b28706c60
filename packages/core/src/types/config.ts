import { createConsoleLogger, Logger } from "../lib/logger";
import type { HttpMethod } from "./http";

/**
 * Header input accepted wherever headers are added
 */
export type HeaderInput =
  | Readonly<Record<string, string | readonly string[]>>
  | ReadonlyMap<string, string | readonly string[]>
  | Headers;

/**
 * Base configuration shared across all HTTP integrations
 */
export interface BaseFluentIntegrationConfig {
  /**
   * Headers added to every request before call-specific ones
   */
  defaultHeaders?: HeaderInput;

  /**
   * Logger for request tracing (default: console, prefixed)
   */
  logger?: Logger;

  /**
   * Emit debug lines on the console logger
   * If not provided, reads FLUENT_REST_DEBUG from the environment
   */
  debug?: boolean;

  /**
   * Verbs the adapter accepts; selecting any other verb fails immediately
   * Default: all verbs
   */
  supportedMethods?: readonly HttpMethod[];
}

/**
 * Picks the configured logger, or a console logger honouring the debug flag
 *
 * @example
 * ```typescript
 * // Debug output from the environment (FLUENT_REST_DEBUG=true)
 * const logger = resolveLogger();
 *
 * // Explicit
 * const logger = resolveLogger({ debug: true });
 * ```
 */
export function resolveLogger(config?: BaseFluentIntegrationConfig): Logger {
  if (config?.logger) {
    return config.logger;
  }
  const debug = config?.debug ?? process.env.FLUENT_REST_DEBUG === "true";
  return createConsoleLogger(debug);
}
