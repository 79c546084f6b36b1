import { readBool, readEnum, readInt, readOptionalString, type EnvSource } from "./config/env.js";
import { DEFAULT_MAX_BODY_BYTES } from "./http/body.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

/**
 * Operator-facing settings of an endpoint. Everything has a default so an
 * empty environment yields a working configuration.
 */
export interface EndpointSettings {
  /** Skip parameter schema validation. */
  skipParamsValidation: boolean;
  /** Skip result schema validation. */
  skipResultValidation: boolean;
  /** Largest accepted batch; `0` leaves batches unbounded. */
  maxBatchSize: number;
  /** Largest accepted request body in bytes; `0` disables the limit. */
  maxBodyBytes: number;
  /** File mirroring the structured logs. */
  logFile: string | null;
  /** Minimum level of emitted log entries. */
  logLevel: LogLevel;
  /** Redact credential-like keys from log payloads. */
  logRedaction: boolean;
}

export const DEFAULT_ENDPOINT_SETTINGS: Readonly<EndpointSettings> = Object.freeze({
  skipParamsValidation: false,
  skipResultValidation: false,
  maxBatchSize: 0,
  maxBodyBytes: DEFAULT_MAX_BODY_BYTES,
  logFile: null,
  logLevel: "info",
  logRedaction: false,
});

/**
 * Reads the endpoint settings from the environment:
 *
 * | Variable | Setting |
 * |---|---|
 * | `JSONRPC_SKIP_PARAMS_VALIDATION` | `skipParamsValidation` |
 * | `JSONRPC_SKIP_RESULT_VALIDATION` | `skipResultValidation` |
 * | `JSONRPC_MAX_BATCH_SIZE` | `maxBatchSize` |
 * | `JSONRPC_MAX_BODY_BYTES` | `maxBodyBytes` |
 * | `JSONRPC_LOG_FILE` | `logFile` |
 * | `JSONRPC_LOG_LEVEL` | `logLevel` |
 * | `JSONRPC_LOG_REDACT` | `logRedaction` |
 *
 * Invalid values fall back to {@link DEFAULT_ENDPOINT_SETTINGS}.
 */
export function loadEndpointSettingsFromEnv(env: EnvSource = process.env): EndpointSettings {
  const defaults = DEFAULT_ENDPOINT_SETTINGS;
  return {
    skipParamsValidation: readBool("JSONRPC_SKIP_PARAMS_VALIDATION", defaults.skipParamsValidation, env),
    skipResultValidation: readBool("JSONRPC_SKIP_RESULT_VALIDATION", defaults.skipResultValidation, env),
    maxBatchSize: readInt("JSONRPC_MAX_BATCH_SIZE", defaults.maxBatchSize, { min: 0 }, env),
    maxBodyBytes: readInt("JSONRPC_MAX_BODY_BYTES", defaults.maxBodyBytes, { min: 0 }, env),
    logFile: readOptionalString("JSONRPC_LOG_FILE", env) ?? defaults.logFile,
    logLevel: readEnum("JSONRPC_LOG_LEVEL", LOG_LEVELS, defaults.logLevel, env),
    logRedaction: readBool("JSONRPC_LOG_REDACT", defaults.logRedaction, env),
  };
}
