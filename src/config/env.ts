/**
 * Tolerant readers for environment variables. Blank values count as unset;
 * unparsable ones fall back to the caller's default rather than throwing, so a
 * typo in a deployment never prevents the endpoint from starting.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Environment source; defaults to `process.env`. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

function readTrimmed(name: string, env: EnvSource): string | undefined {
  const raw = env[name];
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Boolean literal ("1", "true", "yes", "on" and their negations), case-insensitive. */
export function readOptionalBool(name: string, env: EnvSource = process.env): boolean | undefined {
  const value = readTrimmed(name, env)?.toLowerCase();
  if (value === undefined) {
    return undefined;
  }
  if (TRUE_LITERALS.has(value)) {
    return true;
  }
  if (FALSE_LITERALS.has(value)) {
    return false;
  }
  return undefined;
}

export function readBool(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  return readOptionalBool(name, env) ?? defaultValue;
}

interface IntOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

/** Base-10 integer within the optional bounds; anything else reads as unset. */
export function readOptionalInt(name: string, options: IntOptions = {}, env: EnvSource = process.env): number | undefined {
  const value = readTrimmed(name, env);
  if (value === undefined || !/^[-+]?\d+$/.test(value)) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed)) {
    return undefined;
  }
  if (options.min !== undefined && parsed < options.min) {
    return undefined;
  }
  if (options.max !== undefined && parsed > options.max) {
    return undefined;
  }
  return parsed;
}

export function readInt(name: string, defaultValue: number, options: IntOptions = {}, env: EnvSource = process.env): number {
  return readOptionalInt(name, options, env) ?? defaultValue;
}

/** Trimmed, non-blank string. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return readTrimmed(name, env);
}

/** Member of the allow-list, matched case-insensitively and returned in its canonical spelling. */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env,
): T | undefined {
  const value = readTrimmed(name, env)?.toLowerCase();
  if (value === undefined) {
    return undefined;
  }
  return allowed.find((candidate) => candidate.toLowerCase() === value);
}

export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env,
): T {
  return readOptionalEnum(name, allowed, env) ?? defaultValue;
}
