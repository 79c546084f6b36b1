import Ajv, { type AnySchema, type ErrorObject, type Options as AjvOptions, type ValidateFunction } from "ajv";

import type { JsonValue } from "../rpc/protocol.js";
import type { SchemaPhase, SchemaSource, ValidationPort } from "./port.js";
import { PARAMS_FIELD, RESULT_FIELD, ValidationErrors } from "./validationErrors.js";

// Ajv ships CommonJS; under Node's ESM loader the default import is the
// module object, whose `default` member holds the constructor.
type AjvInstance = import("ajv").default;
type AjvConstructor = new (options?: AjvOptions) => AjvInstance;
const AjvCtor =
  (Ajv as unknown as { default?: AjvConstructor }).default ?? (Ajv as unknown as AjvConstructor);

/** Issue recorded first for every failed validation. */
export const ROOT_FAILURE_ISSUE = "#: validation failed";

/** Raised when a schema cannot be parsed or compiled. */
export class SchemaCompileError extends Error {
  readonly method: string;
  readonly phase: SchemaPhase;

  constructor(method: string, phase: SchemaPhase, reason: string, options?: { cause?: unknown }) {
    super(`failed to compile ${phase} schema for ${method}: ${reason}`, options);
    this.name = "SchemaCompileError";
    this.method = method;
    this.phase = phase;
  }
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Formats one Ajv error as `<json-pointer>: <message>`. */
export function formatIssue(error: ErrorObject): string {
  return `#${error.instancePath}: ${error.message ?? error.keyword}`;
}

/**
 * Reference {@link ValidationPort} backed by Ajv. Every schema is compiled by
 * its own Ajv instance so methods never share `$id` namespaces, and cached
 * per method and phase. Compilation happens during registration; serving only
 * reads the caches.
 */
export class JsonSchemaValidator implements ValidationPort {
  private readonly paramsSchemas = new Map<string, ValidateFunction>();
  private readonly resultSchemas = new Map<string, ValidateFunction>();
  private readonly ajvOptions: AjvOptions;

  constructor(options: AjvOptions = {}) {
    // Unknown keywords and formats are tolerated so schemas produced by other
    // generators still compile.
    this.ajvOptions = { allErrors: true, strict: false, logger: false, ...options };
  }

  addParamsSchema(method: string, schema: SchemaSource): void {
    this.paramsSchemas.set(method, this.compile(method, "params", schema));
  }

  addResultSchema(method: string, schema: SchemaSource): void {
    this.resultSchemas.set(method, this.compile(method, "result", schema));
  }

  validateParams(method: string, value: JsonValue): ValidationErrors | null {
    return this.validate(this.paramsSchemas.get(method), PARAMS_FIELD, value);
  }

  validateResult(method: string, value: JsonValue): ValidationErrors | null {
    return this.validate(this.resultSchemas.get(method), RESULT_FIELD, value);
  }

  hasSchema(method: string, phase: SchemaPhase): boolean {
    return (phase === "params" ? this.paramsSchemas : this.resultSchemas).has(method);
  }

  private compile(method: string, phase: SchemaPhase, source: SchemaSource): ValidateFunction {
    let schema: AnySchema;
    try {
      schema = parseSchemaSource(source);
    } catch (error) {
      throw new SchemaCompileError(method, phase, reasonOf(error), { cause: error });
    }
    try {
      return new AjvCtor(this.ajvOptions).compile(schema);
    } catch (error) {
      throw new SchemaCompileError(method, phase, reasonOf(error), { cause: error });
    }
  }

  private validate(validator: ValidateFunction | undefined, field: string, value: JsonValue): ValidationErrors | null {
    if (!validator) {
      return null;
    }

    let valid: boolean;
    try {
      valid = validator(value) === true;
    } catch (error) {
      return new ValidationErrors({ [field]: [reasonOf(error)] });
    }
    if (valid) {
      return null;
    }

    const issues = new ValidationErrors().add(field, ROOT_FAILURE_ISSUE);
    for (const error of validator.errors ?? []) {
      issues.add(field, formatIssue(error));
    }
    return issues;
  }
}

/**
 * Normalises the accepted schema sources into a private JSON snapshot, so a
 * caller mutating its schema object afterwards cannot alter the cache.
 */
function parseSchemaSource(source: SchemaSource): AnySchema {
  const text =
    typeof source === "string"
      ? source
      : source instanceof Uint8Array
        ? new TextDecoder("utf-8", { fatal: true }).decode(source)
        : JSON.stringify(source);
  const schema: AnySchema = JSON.parse(text);
  if (typeof schema !== "boolean" && (typeof schema !== "object" || schema === null || Array.isArray(schema))) {
    throw new Error("schema must be a JSON object or boolean");
  }
  return schema;
}
