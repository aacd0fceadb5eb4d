import { BOOLEAN_FALSE_VALUES, BOOLEAN_TRUE_VALUES } from './config.constants';

export function parseOptionalBoolean(value: string | undefined, defaultValue = false): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (BOOLEAN_TRUE_VALUES.includes(normalized)) {
    return true;
  }

  if (BOOLEAN_FALSE_VALUES.includes(normalized)) {
    return false;
  }

  return defaultValue;
}

export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  // Ports, timeouts and counts are all whole numbers
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Parses a string environment variable with a default value.
 *
 * Returns the provided value if present, otherwise returns the default.
 * Used for optional string configuration values.
 */
export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

/**
 * Reads a required string environment variable.
 *
 * @param name - Environment variable name, used in the error message
 * @throws {Error} If the variable is unset or blank
 */
export function parseRequiredString(name: string, value: string | undefined): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new Error(`${name} is required`);
  }
  return trimmed;
}

/**
 * Parses a TCP port, rejecting 0 and anything above 65535.
 */
export function parsePort(name: string, value: string | undefined, defaultValue: number): number {
  const port = parseNumberWithDefault(value, defaultValue);
  if (port < 1 || port > 65535) {
    throw new Error(`${name} must be between 1 and 65535 (got ${port})`);
  }
  return port;
}
