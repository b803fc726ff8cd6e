/**
 * Readers for `NODEGRAPH_*` environment variables. Every reader takes the
 * environment as an explicit source (defaulting to `process.env`) and returns
 * `undefined` for absent, blank or unrecognised values so callers decide the
 * fallback.
 */

/** Environment mapping consulted by the readers. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

function readTrimmed(env: EnvSource, name: string): string | undefined {
  const raw = env[name];
  if (typeof raw !== "string") {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/** Boolean flag accepting `1/true/yes/on` and `0/false/no/off` in any case. */
export function readOptionalBool(name: string, env: EnvSource = process.env): boolean | undefined {
  const value = readTrimmed(env, name)?.toLowerCase();
  if (value === undefined) {
    return undefined;
  }
  if (TRUE_LITERALS.has(value)) {
    return true;
  }
  return FALSE_LITERALS.has(value) ? false : undefined;
}

export function readBool(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  return readOptionalBool(name, env) ?? defaultValue;
}

export interface IntegerBounds {
  readonly min?: number;
  readonly max?: number;
}

/** Base-10 safe integer within the optional inclusive bounds. */
export function readOptionalInt(name: string, bounds: IntegerBounds = {}, env: EnvSource = process.env): number | undefined {
  const value = readTrimmed(env, name);
  if (value === undefined || !/^[-+]?\d+$/.test(value)) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed)) {
    return undefined;
  }
  if ((bounds.min !== undefined && parsed < bounds.min) || (bounds.max !== undefined && parsed > bounds.max)) {
    return undefined;
  }
  return parsed;
}

export function readInt(name: string, defaultValue: number, bounds: IntegerBounds = {}, env: EnvSource = process.env): number {
  return readOptionalInt(name, bounds, env) ?? defaultValue;
}

/** Case-insensitive match against an allow-list, returning the canonical spelling. */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env,
): T | undefined {
  const value = readTrimmed(env, name)?.toLowerCase();
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

/** Trimmed string, or undefined when blank. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return readTrimmed(env, name);
}
