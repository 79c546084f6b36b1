import type { JsonValue } from "../rpc/protocol.js";
import type { ValidationErrors } from "./validationErrors.js";

/** Validation phase a schema applies to. */
export type SchemaPhase = "params" | "result";

/** JSON Schema as text, UTF-8 bytes or an already parsed document. */
export type SchemaSource = string | Uint8Array | Record<string, unknown> | boolean;

/**
 * Contract of the schema validator consumed by the dispatcher. Schemas are
 * registered per method and per phase before serving; validation of a method
 * or phase without a schema succeeds.
 */
export interface ValidationPort {
  /** Compiles and caches the parameters schema. Throws on a malformed schema. */
  addParamsSchema(method: string, schema: SchemaSource): void;
  /** Compiles and caches the result schema. Throws on a malformed schema. */
  addResultSchema(method: string, schema: SchemaSource): void;
  /** Whether a schema is registered for the method and phase. */
  hasSchema(method: string, phase: SchemaPhase): boolean;
  /** Returns `null` when valid, the issues keyed under `params` otherwise. */
  validateParams(method: string, value: JsonValue): ValidationErrors | null;
  /** Returns `null` when valid, the issues keyed under `result` otherwise. */
  validateResult(method: string, value: JsonValue): ValidationErrors | null;
}
