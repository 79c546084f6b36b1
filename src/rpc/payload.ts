import type { ZodError, ZodType, ZodTypeDef } from "zod";

import type { JsonValue } from "./protocol.js";

/**
 * Binding between a method and the type of one of its payloads. The zod
 * schema decodes incoming parameters into a fresh value and describes the
 * payload to document collectors; the optional factory allocates a
 * zero-valued output buffer that handlers fill in place.
 */
export interface PayloadPort<T> {
  readonly schema: ZodType<T, ZodTypeDef, unknown>;
  readonly create?: () => T;
  /** Component name used by document collectors. */
  readonly name?: string;
}

/** Options accepted by {@link payload}. */
export interface PayloadOptions<T> {
  create?: () => T;
  name?: string;
}

/** Declares a payload port from a zod schema. */
export function payload<T>(schema: ZodType<T, ZodTypeDef, unknown>, options: PayloadOptions<T> = {}): PayloadPort<T> {
  return Object.freeze({ schema, create: options.create, name: options.name });
}

/**
 * zod issue codes raised by value constraints (`min`, `max`, formats,
 * refinements) rather than by the shape of the payload.
 */
const CONSTRAINT_ISSUE_CODES: ReadonlySet<string> = new Set([
  "too_small",
  "too_big",
  "invalid_string",
  "not_multiple_of",
  "custom",
]);

/** Raised when parameters do not match the input port of a method. */
export class PayloadDecodeError extends Error {
  readonly issues: ReadonlyArray<{ path: string; message: string }>;
  /**
   * True when the payload has the right shape and only value constraints
   * failed. Such failures are left to the schema validator when one applies.
   */
  readonly constraintOnly: boolean;

  constructor(error: ZodError) {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join(".") || "root",
      message: issue.message,
    }));
    super(issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ") || "invalid payload", {
      cause: error,
    });
    this.name = "PayloadDecodeError";
    this.issues = issues;
    this.constraintOnly =
      error.issues.length > 0 && error.issues.every((issue) => CONSTRAINT_ISSUE_CODES.has(issue.code));
  }
}

/** Raised when a handler output cannot be represented as JSON. */
export class PayloadEncodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PayloadEncodeError";
  }
}

/**
 * Decodes raw parameters into a fresh value of the port type. Unknown keys are
 * dropped by zod; missing or mistyped ones raise {@link PayloadDecodeError}.
 */
export function decodePayload<T>(port: PayloadPort<T>, raw: JsonValue | undefined): T {
  const parsed = port.schema.safeParse(raw);
  if (!parsed.success) {
    throw new PayloadDecodeError(parsed.error);
  }
  return parsed.data;
}

/** Allocates the output buffer handed to handlers, or `undefined` without a factory. */
export function allocatePayload<T>(port: PayloadPort<T>): T | undefined {
  return port.create?.();
}

/**
 * Encodes a handler output exactly as it will travel on the wire and returns
 * the decoded JSON value, so `toJSON` hooks, dates and dropped `undefined`
 * members are resolved once. Outputs without a JSON form encode to `null`.
 */
export function encodePayload(value: unknown): JsonValue {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PayloadEncodeError(reason, { cause: error });
  }
  if (text === undefined) {
    return null;
  }
  const decoded: JsonValue = JSON.parse(text);
  return decoded;
}
