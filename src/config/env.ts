/**
 * Helpers reading environment variables with consistent coercion rules. Every
 * protocol knob goes through these readers so operators get the same parsing
 * behaviour (trimmed values, bounded numbers, forgiving booleans) everywhere.
 */
const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Returns the trimmed value, or `undefined` when the variable is unset or blank. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * Reads the variable as a boolean. "1", "true", "yes" and "on" are truthy,
 * "0", "false", "no" and "off" falsy; anything else yields the default.
 */
export function readBool(name: string, defaultValue: boolean): boolean {
  return readOptionalBool(name) ?? defaultValue;
}

export function readOptionalBool(name: string): boolean | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return undefined;
  }

  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return undefined;
}

export interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  // `Infinity` and `NaN` never pass so callers fall back to their default.
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Reads a base-10 integer; out-of-bounds or malformed values yield the default. */
export function readInt(name: string, defaultValue: number, options?: NumberOptions): number {
  return readOptionalInt(name, options) ?? defaultValue;
}

export function readOptionalInt(name: string, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return undefined;
  }

  if (!/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }

  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }

  return withinBounds(value, options) ? value : undefined;
}

/** Reads a finite floating-point number. */
export function readNumber(name: string, defaultValue: number, options?: NumberOptions): number {
  return readOptionalNumber(name, options) ?? defaultValue;
}

export function readOptionalNumber(name: string, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(process.env[name]);
  if (!normalised) {
    return undefined;
  }

  const value = Number.parseFloat(normalised);
  return withinBounds(value, options) ? value : undefined;
}

/** Reads a trimmed string. Blank values count as unset. */
export function readString(name: string, defaultValue: string): string {
  return readOptionalString(name) ?? defaultValue;
}

export function readOptionalString(name: string): string | undefined {
  return normaliseEnvValue(process.env[name]);
}
