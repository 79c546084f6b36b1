import { zodToJsonSchema } from "zod-to-json-schema";

import { RegistrationError } from "../rpc/errors.js";
import type { PayloadPort } from "../rpc/payload.js";
import type { MethodCollector, MethodEntry } from "../rpc/registry.js";
import type { ValidationPort } from "../validation/port.js";

export interface OpenApiSchemaRef {
  $ref: string;
}

export interface OpenApiMediaType {
  schema: OpenApiSchemaRef;
}

export interface OpenApiResponse {
  description: string;
  content?: Record<string, OpenApiMediaType>;
}

export interface OpenApiOperation {
  operationId: string;
  summary?: string;
  description?: string;
  tags?: string[];
  deprecated?: boolean;
  requestBody?: { content: Record<string, OpenApiMediaType> };
  responses: Record<string, OpenApiResponse>;
}

export interface OpenApiInfo {
  title: string;
  version: string;
  description?: string;
}

export interface OpenApiDocument {
  openapi: "3.0.3";
  info: OpenApiInfo;
  paths: Record<string, { post: OpenApiOperation }>;
  components: { schemas: Record<string, unknown> };
  "x-envelope": "jsonrpc-2.0";
}

/** Customisation applied to an operation while it is collected. */
export type OperationSetup = (operation: OpenApiOperation) => void;

export interface OpenApiCollectorOptions {
  readonly info?: Partial<OpenApiInfo>;
  /**
   * Validation port receiving the params and result JSON Schemas of every
   * collected method.
   */
  readonly validator?: ValidationPort;
}

const JSON_MEDIA_TYPE = "application/json";

function pascalCase(value: string): string {
  return value
    .split(/[^A-Za-z0-9]+/)
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}

/**
 * Builds an OpenAPI 3.0.3 document from the registered methods, one `POST`
 * operation per method name, and feeds the JSON Schemas of their payloads to
 * a validation port. Register it on the registry before adding methods.
 */
export class OpenApiCollector implements MethodCollector {
  private readonly info: OpenApiInfo;
  private readonly validator?: ValidationPort;
  private readonly paths = new Map<string, OpenApiOperation>();
  private readonly schemas = new Map<string, unknown>();
  private readonly annotations = new Map<string, OperationSetup[]>();

  constructor(options: OpenApiCollectorOptions = {}) {
    this.info = {
      title: options.info?.title ?? "JSON-RPC API",
      version: options.info?.version ?? "0.0.0",
      ...(options.info?.description !== undefined ? { description: options.info.description } : {}),
    };
    this.validator = options.validator;
  }

  /** Registers customisations applied when the named method is collected. */
  annotate(name: string, ...setups: OperationSetup[]): void {
    this.annotations.set(name, [...(this.annotations.get(name) ?? []), ...setups]);
  }

  collect(entry: MethodEntry): void {
    try {
      this.paths.set(entry.name, this.buildOperation(entry));
      this.provideSchemas(entry);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RegistrationError(`failed to add to OpenAPI schema: ${entry.name}: ${reason}`, { cause: error });
    }
  }

  /** Snapshot of the document collected so far. */
  document(): OpenApiDocument {
    const paths: OpenApiDocument["paths"] = {};
    for (const [name, operation] of this.paths) {
      paths[name] = { post: operation };
    }
    return {
      openapi: "3.0.3",
      info: { ...this.info },
      paths,
      components: { schemas: Object.fromEntries(this.schemas) },
      "x-envelope": "jsonrpc-2.0",
    };
  }

  toJSON(): OpenApiDocument {
    return this.document();
  }

  private buildOperation(entry: MethodEntry): OpenApiOperation {
    const operation: OpenApiOperation = { operationId: entry.name, responses: {} };
    if (entry.title !== undefined) {
      operation.summary = entry.title;
    }
    if (entry.description !== undefined) {
      operation.description = entry.description;
    }
    if (entry.tags.length > 0) {
      operation.tags = [...entry.tags];
    }
    if (entry.deprecated) {
      operation.deprecated = true;
    }

    if (entry.input) {
      const ref = this.registerComponent(entry.input, `${pascalCase(entry.name)}Params`);
      operation.requestBody = { content: { [JSON_MEDIA_TYPE]: { schema: ref } } };
    }

    if (entry.output) {
      const ref = this.registerComponent(entry.output, `${pascalCase(entry.name)}Result`);
      operation.responses["200"] = { description: "OK", content: { [JSON_MEDIA_TYPE]: { schema: ref } } };
    } else {
      operation.responses["204"] = { description: "No Content" };
    }

    for (const setup of this.annotations.get(entry.name) ?? []) {
      setup(operation);
    }
    return operation;
  }

  private registerComponent(port: PayloadPort<unknown>, fallbackName: string): OpenApiSchemaRef {
    const name = port.name ?? fallbackName;
    this.schemas.set(
      name,
      zodToJsonSchema(port.schema, { target: "openApi3", $refStrategy: "none", removeAdditionalStrategy: "strict" }),
    );
    return { $ref: `#/components/schemas/${name}` };
  }

  private provideSchemas(entry: MethodEntry): void {
    if (!this.validator) {
      return;
    }
    if (entry.input) {
      this.validator.addParamsSchema(entry.name, JSON.stringify(toValidationSchema(entry.input)));
    }
    if (entry.output) {
      this.validator.addResultSchema(entry.name, JSON.stringify(toValidationSchema(entry.output)));
    }
  }
}

/**
 * JSON Schema (draft-07) of a payload port, as consumed by validators. Objects
 * stay open unless the zod object is `.strict()`, since decoding strips
 * unknown members instead of rejecting them.
 */
export function toValidationSchema(port: PayloadPort<unknown>): unknown {
  return zodToJsonSchema(port.schema, {
    target: "jsonSchema7",
    $refStrategy: "none",
    removeAdditionalStrategy: "strict",
  });
}
