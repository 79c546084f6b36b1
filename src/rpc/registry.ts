import { RegistrationError } from "./errors.js";
import { composeMiddlewares, createFailingInteractor, type Middleware } from "./middleware.js";
import type { PayloadPort } from "./payload.js";
import {
  hasDescription,
  hasInputPort,
  hasIsDeprecated,
  hasName,
  hasOutputPort,
  hasTags,
  hasTitle,
  interact,
  type InteractFn,
  type Interactor,
} from "./usecase.js";

/**
 * Registry record binding a method name to its wrapped handlers and payload
 * ports. Entries are frozen at registration and only read afterwards.
 */
export interface MethodEntry {
  readonly name: string;
  /** Business logic wrapped by the registry middlewares. */
  readonly handler: Interactor;
  /** Failure-surfacing handler wrapped by the same middlewares. */
  readonly failingHandler: Interactor;
  readonly input?: PayloadPort<unknown>;
  readonly output?: PayloadPort<unknown>;
  readonly title?: string;
  readonly description?: string;
  readonly tags: readonly string[];
  readonly deprecated: boolean;
  /** Unwrapped business logic, as supplied at registration. */
  readonly useCase: Interactor;
}

/**
 * Collaborator notified once per registration (document generators, schema
 * providers). Collectors never run on the request path.
 */
export interface MethodCollector {
  collect(entry: MethodEntry): void;
}

export interface MethodRegistryOptions {
  /** Middlewares composed around every handler; the first one is outermost. */
  readonly middlewares?: readonly Middleware[];
  /** Collectors notified for every registered method. */
  readonly collectors?: readonly MethodCollector[];
}

/** Capabilities recorded alongside an explicit registration. */
export interface RegisterOptions {
  readonly title?: string;
  readonly description?: string;
  readonly tags?: readonly string[];
  readonly deprecated?: boolean;
}

/**
 * Maps method names to handlers.
 *
 * The registry has a two-phase lifecycle: methods are registered during a
 * build phase, then {@link seal} switches it to a read-only serving phase.
 * Registration runs synchronously, so the build phase is exclusive without a
 * lock; once sealed, lookups run against an immutable map. Registration MUST
 * complete before traffic is served (the endpoint seals the registry on its
 * first request).
 *
 * Registering a name twice replaces the previous entry: the last registration
 * wins, which is the supported way to override a method.
 */
export class MethodRegistry {
  private readonly methods = new Map<string, MethodEntry>();
  private readonly middlewares: readonly Middleware[];
  private readonly collectors: MethodCollector[];
  private sealed = false;

  constructor(options: MethodRegistryOptions = {}) {
    this.middlewares = [...(options.middlewares ?? [])];
    this.collectors = [...(options.collectors ?? [])];
  }

  /** Registers a collector notified for every subsequent registration. */
  addCollector(collector: MethodCollector): void {
    this.assertBuilding();
    this.collectors.push(collector);
  }

  /**
   * Registers a handler under an explicit name with optional payload ports.
   * Throws {@link RegistrationError} when the name is empty or the registry is
   * sealed.
   */
  register<I, O>(
    name: string,
    handler: Interactor<I, O> | InteractFn<I, O>,
    input?: PayloadPort<I>,
    output?: PayloadPort<O>,
    options: RegisterOptions = {},
  ): MethodEntry {
    this.assertBuilding();
    if (typeof name !== "string" || name.length === 0) {
      throw new RegistrationError("method name is required");
    }

    const useCase: Interactor = typeof handler === "function" ? interact(handler) : handler;
    const entry: MethodEntry = Object.freeze({
      name,
      handler: composeMiddlewares(useCase, this.middlewares),
      failingHandler: composeMiddlewares(createFailingInteractor(), this.middlewares),
      input,
      output,
      title: options.title,
      description: options.description,
      tags: Object.freeze([...(options.tags ?? [])]),
      deprecated: options.deprecated ?? false,
      useCase,
    });

    this.methods.set(name, entry);
    for (const collector of this.collectors) {
      collector.collect(entry);
    }
    return entry;
  }

  /**
   * Registers a use case, probing its optional capabilities (name, title,
   * description, tags, deprecation, input and output ports) once.
   */
  add(useCase: Interactor): MethodEntry {
    if (!hasName(useCase)) {
      throw new RegistrationError("use case name is required");
    }
    return this.register(
      useCase.name,
      useCase,
      hasInputPort(useCase) ? useCase.input : undefined,
      hasOutputPort(useCase) ? useCase.output : undefined,
      {
        title: hasTitle(useCase) ? useCase.title : undefined,
        description: hasDescription(useCase) ? useCase.description : undefined,
        tags: hasTags(useCase) ? useCase.tags : undefined,
        deprecated: hasIsDeprecated(useCase) ? useCase.deprecated : undefined,
      },
    );
  }

  lookup(name: string): MethodEntry | undefined {
    return this.methods.get(name);
  }

  has(name: string): boolean {
    return this.methods.has(name);
  }

  get size(): number {
    return this.methods.size;
  }

  /** Iterates over the registered entries in registration order. */
  entries(): IterableIterator<MethodEntry> {
    return this.methods.values();
  }

  /** Ends the build phase. Further registrations throw. */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  private assertBuilding(): void {
    if (this.sealed) {
      throw new RegistrationError("registry is sealed: register methods before serving requests");
    }
  }
}
