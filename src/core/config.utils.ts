// Utility functions for configuration parsing

/**
 * Parse environment variable with type conversion
 */
export function parseEnvVar<T>(
  key: string,
  defaultValue: T,
  parser: (value: string) => T
): T {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }

  try {
    return parser(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`Invalid value for ${key}: ${value} (${reason}), using default: ${String(defaultValue)}`);
    return defaultValue;
  }
}

/**
 * Parse integer with validation
 */
export function parseIntWithValidation(
  value: string,
  min?: number,
  max?: number
): number {
  const parsed = Number(value);

  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid integer: ${value}`);
  }

  if (min !== undefined && parsed < min) {
    throw new Error(`Value ${parsed} is below minimum ${min}`);
  }

  if (max !== undefined && parsed > max) {
    throw new Error(`Value ${parsed} is above maximum ${max}`);
  }

  return parsed;
}

export function parsePositiveInt(key: string, defaultValue: number): number {
  return parseEnvVar(key, defaultValue, (value) =>
    parseIntWithValidation(value, 1)
  );
}

export function parseNonNegativeInt(key: string, defaultValue: number): number {
  return parseEnvVar(key, defaultValue, (value) =>
    parseIntWithValidation(value, 0)
  );
}

/**
 * Parse one of a fixed set of string values
 */
export function parseEnum<T extends string>(
  key: string,
  allowed: readonly T[],
  defaultValue: T
): T {
  return parseEnvVar(key, defaultValue, (value) => {
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new Error(`Expected one of ${allowed.join(', ')}`);
    }
    return match;
  });
}

export function parseOptionalString(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}
