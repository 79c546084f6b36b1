import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { getRpcCall, type RpcCallSnapshot } from "./infra/rpcContext.js";

/** Placeholder inserted when a sensitive value is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

/** Keys whose values are redacted when redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "proxy-authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "token",
  "access_token",
  "refresh_token",
  "password",
  "cookie",
  "set-cookie",
]);

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_WEIGHT: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  request_id?: string;
  method?: string;
  jsonrpc_id?: string | number | null;
  transport?: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Minimum level emitted; lower levels are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  /** File mirroring every emitted line, created on first write. */
  readonly logFile?: string | null;
  /** Redacts the values of well-known credential keys found in payloads. */
  readonly redactionEnabled?: boolean;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
  /**
   * Destination of the JSON lines. Defaults to stdout; pass `null` to keep
   * entries off the process streams (the listener and file still receive them).
   */
  readonly write?: ((line: string) => void) | null;
}

/**
 * Structured logger that emits JSON lines and optionally mirrors them to a
 * file. File writes are queued sequentially to guarantee ordering. Entries
 * emitted while a call is being dispatched are tagged with its method, its
 * JSON-RPC identifier and the transport correlation identifier.
 */
export class StructuredLogger {
  private readonly level: LogLevel;
  private readonly logFile?: string;
  private readonly redactionEnabled: boolean;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly writeLine: ((line: string) => void) | null;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.logFile = options.logFile ?? undefined;
    this.redactionEnabled = options.redactionEnabled ?? false;
    this.entryListener = options.onEntry;
    this.writeLine =
      options.write === undefined ? (line) => void process.stdout.write(line) : options.write;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /** Whether entries of the provided level are emitted. */
  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
  }

  /**
   * Waits for all pending file writes. Tests rely on this helper to assert the
   * content of mirrored log files deterministically.
   */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.collectCorrelationFields(getRpcCall()),
      ...(payload !== undefined ? { payload: this.redact(payload) } : {}),
    };
    const line = `${this.serialise(entry)}\n`;
    this.writeLine?.(line);
    if (this.entryListener) {
      const snapshot: LogEntry = JSON.parse(line);
      this.entryListener(snapshot);
    }
    this.enqueueFileWrite(line);
  }

  /** Serialises the entry, replacing a payload that has no JSON form. */
  private serialise(entry: LogEntry): string {
    try {
      return JSON.stringify(entry);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return JSON.stringify({ ...entry, payload: { unserialisable: reason } });
    }
  }

  private enqueueFileWrite(line: string): void {
    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        if (!this.logDirectoryReady) {
          await mkdir(dirname(logFile), { recursive: true });
          this.logDirectoryReady = true;
        }
        await appendFile(logFile, line, "utf8");
      } catch (error) {
        const failure: LogEntry = {
          timestamp: new Date().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: { message: error instanceof Error ? error.message : String(error) },
        };
        process.stderr.write(`${JSON.stringify(failure)}\n`);
        // Allow the next write to retry the directory creation.
        this.logDirectoryReady = false;
      }
    });
  }

  private collectCorrelationFields(call: RpcCallSnapshot | undefined): Partial<LogEntry> {
    if (!call) {
      return {};
    }
    const fields: Partial<LogEntry> = { method: call.method };
    if (call.requestId !== undefined) {
      fields.request_id = call.requestId;
    }
    if (call.id !== undefined) {
      fields.jsonrpc_id = call.id;
    }
    if (call.transport !== undefined) {
      fields.transport = call.transport;
    }
    return fields;
  }

  private redact(value: unknown): unknown {
    if (!this.redactionEnabled) {
      return value;
    }
    return this.deepRedact(value);
  }

  private deepRedact(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }
}
