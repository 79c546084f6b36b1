import type { CallContext } from "../infra/rpcContext.js";
import type { PayloadPort } from "./payload.js";
import type { JsonRpcId } from "./protocol.js";

/**
 * Context handed to every handler invocation. The dispatcher always provides
 * a signal (a never-aborting one when the transport supplied none).
 */
export interface InteractContext extends CallContext {
  readonly signal: AbortSignal;
  /** Method being dispatched. */
  readonly method: string;
  /** JSON-RPC identifier; `undefined` for notifications. */
  readonly id?: JsonRpcId;
  /**
   * Decode or validation failure being surfaced through the middleware chain.
   * Only set on the failing path.
   */
  readonly failure?: unknown;
}

/**
 * Business logic of one method. The handler receives the decoded input and
 * the freshly allocated output buffer; it either fills the buffer in place or
 * resolves with the output value, which then replaces the buffer.
 */
export interface Interactor<I = unknown, O = unknown> {
  interact(context: InteractContext, input: I, output: O): Promise<O | void>;
}

/** Plain function form of {@link Interactor.interact}. */
export type InteractFn<I = unknown, O = unknown> = (
  context: InteractContext,
  input: I,
  output: O,
) => Promise<O | void>;

/** Wraps a plain function into an {@link Interactor}. */
export function interact<I = unknown, O = unknown>(fn: InteractFn<I, O>): Interactor<I, O> {
  return { interact: fn };
}

export interface HasName {
  readonly name: string;
}

export interface HasTitle {
  readonly title: string;
}

export interface HasDescription {
  readonly description: string;
}

export interface HasTags {
  readonly tags: readonly string[];
}

export interface HasIsDeprecated {
  readonly deprecated: boolean;
}

export interface HasInputPort<I = unknown> {
  readonly input: PayloadPort<I>;
}

export interface HasOutputPort<O = unknown> {
  readonly output: PayloadPort<O>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isPayloadPort(value: unknown): value is PayloadPort<unknown> {
  return isRecord(value) && isRecord(value.schema) && typeof value.schema.safeParse === "function";
}

export function hasName(candidate: object): candidate is HasName {
  return "name" in candidate && isNonEmptyString(candidate.name);
}

export function hasTitle(candidate: object): candidate is HasTitle {
  return "title" in candidate && isNonEmptyString(candidate.title);
}

export function hasDescription(candidate: object): candidate is HasDescription {
  return "description" in candidate && isNonEmptyString(candidate.description);
}

export function hasTags(candidate: object): candidate is HasTags {
  return (
    "tags" in candidate &&
    Array.isArray(candidate.tags) &&
    candidate.tags.every((tag: unknown) => typeof tag === "string")
  );
}

export function hasIsDeprecated(candidate: object): candidate is HasIsDeprecated {
  return "deprecated" in candidate && typeof candidate.deprecated === "boolean";
}

export function hasInputPort(candidate: object): candidate is HasInputPort {
  return "input" in candidate && isPayloadPort(candidate.input);
}

export function hasOutputPort(candidate: object): candidate is HasOutputPort {
  return "output" in candidate && isPayloadPort(candidate.output);
}

/** Declarative description accepted by {@link UseCase}. */
export interface UseCaseDefinition<I, O> {
  name: string;
  title?: string;
  description?: string;
  tags?: readonly string[];
  deprecated?: boolean;
  input?: PayloadPort<I>;
  output?: PayloadPort<O>;
  interact: InteractFn<I, O>;
}

/**
 * Convenience implementation of every optional capability. Registries probe
 * the capabilities structurally, so any object exposing the same members works
 * equally well.
 */
export class UseCase<I = undefined, O = undefined> implements Interactor<I, O>, HasName {
  readonly name: string;
  readonly title?: string;
  readonly description?: string;
  readonly tags?: readonly string[];
  readonly deprecated?: boolean;
  readonly input?: PayloadPort<I>;
  readonly output?: PayloadPort<O>;
  private readonly handler: InteractFn<I, O>;

  constructor(definition: UseCaseDefinition<I, O>) {
    this.name = definition.name;
    this.title = definition.title;
    this.description = definition.description;
    this.tags = definition.tags;
    this.deprecated = definition.deprecated;
    this.input = definition.input;
    this.output = definition.output;
    this.handler = definition.interact;
  }

  interact(context: InteractContext, input: I, output: O): Promise<O | void> {
    return this.handler(context, input, output);
  }
}
