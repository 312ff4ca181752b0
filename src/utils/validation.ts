/**
 * Validation utilities for configuration and inputs
 */

import { ConfigurationError } from "./errors";

/**
 * Validates Jira URL format
 */
export function isValidJiraUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return (
      (parsed.protocol === "http:" || parsed.protocol === "https:") &&
      parsed.hostname.length > 0
    );
  } catch {
    return false;
  }
}

/**
 * Validates that a value is a string that is not empty after trimming
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Narrows an unknown value to a plain object
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates required environment variable
 */
export function validateRequired(
  name: string,
  value: string | undefined
): string {
  if (!value || !isNonEmptyString(value)) {
    throw new ConfigurationError(
      `Missing required environment variable: ${name}\n` +
        `Please add this to your .env file. See .env.example for reference.`
    );
  }
  return value;
}

/**
 * Gets optional environment variable with default value
 */
export function getOptional(
  value: string | undefined,
  defaultValue: string
): string {
  return value && isNonEmptyString(value) ? value : defaultValue;
}

/**
 * Validates a number setting against an inclusive lower bound
 */
export function validateNumber(
  name: string,
  value: unknown,
  { min, integer = false }: { min: number; integer?: boolean }
): number {
  const parsed =
    typeof value === "string" && value.trim() !== "" ? Number(value) : value;

  if (
    typeof parsed !== "number" ||
    !Number.isFinite(parsed) ||
    parsed < min ||
    (integer && !Number.isInteger(parsed))
  ) {
    throw new ConfigurationError(
      `Invalid ${name}: ${String(value)}\n` +
        `Expected ${integer ? "an integer" : "a number"} >= ${min}`
    );
  }

  return parsed;
}

/**
 * Validates a list of non-empty strings
 */
export function validateStringList(name: string, value: unknown): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigurationError(`${name} must be a non-empty list of strings`);
  }

  const invalid = value.filter((entry) => !isNonEmptyString(entry));
  if (invalid.length > 0) {
    throw new ConfigurationError(
      `${name} contains ${invalid.length} empty or non-string entr${
        invalid.length === 1 ? "y" : "ies"
      }`
    );
  }

  return value.map((entry: string) => entry.trim());
}

/**
 * Compiles a regular expression from configuration
 */
export function validatePattern(
  name: string,
  source: string,
  flags: string
): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid pattern in ${name}: /${source}/${flags}`,
      { cause: error }
    );
  }
}
