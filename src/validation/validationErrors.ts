import type { ErrorWithFields } from "../rpc/errors.js";

/** Field location used for parameter issues. */
export const PARAMS_FIELD = "params";
/** Field location used for result issues. */
export const RESULT_FIELD = "result";

/**
 * Aggregate of validation issues keyed by field location (`params`,
 * `result`, ...). The error message is fixed; the per-field issues are
 * exposed through {@link fields} with keys and issue lists sorted lexically so
 * the wire payload is deterministic.
 */
export class ValidationErrors extends Error implements ErrorWithFields {
  private readonly issues = new Map<string, string[]>();

  constructor(initial?: Record<string, readonly string[]>) {
    super("validation failed");
    this.name = "ValidationErrors";
    if (initial) {
      for (const [field, list] of Object.entries(initial)) {
        for (const issue of list) {
          this.add(field, issue);
        }
      }
    }
  }

  /** Appends an issue under the provided field location. */
  add(field: string, issue: string): this {
    const list = this.issues.get(field);
    if (list) {
      list.push(issue);
    } else {
      this.issues.set(field, [issue]);
    }
    return this;
  }

  /** Issues recorded for a field, in insertion order. */
  get(field: string): readonly string[] {
    return this.issues.get(field) ?? [];
  }

  get size(): number {
    return this.issues.size;
  }

  fields(): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    const keys = [...this.issues.keys()].sort();
    for (const key of keys) {
      result[key] = [...(this.issues.get(key) ?? [])].sort();
    }
    return result;
  }
}
