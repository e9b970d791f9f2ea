/**
 * @otpkeep/otp - Parameter parsing
 *
 * @packageDocumentation
 */

import { FormatError, InvalidTokenTypeError } from "./errors";
import { HASH_ALGORITHMS, TOKEN_TYPES } from "./types";
import type { HashAlgorithm, TokenType } from "./types";

/**
 * Match a token type name, ignoring case
 * @throws InvalidTokenTypeError
 */
export function parseTokenType(value: string): TokenType {
  const upper = value.trim().toUpperCase();
  const found = TOKEN_TYPES.find((type) => type.toUpperCase() === upper);
  if (!found) {
    throw new InvalidTokenTypeError(value);
  }
  return found;
}

/**
 * Match an algorithm name; "sha256" and "SHA-256" both give SHA256
 * @throws FormatError
 */
export function parseAlgorithm(value: string): HashAlgorithm {
  const upper = value.trim().toUpperCase().replace(/-/g, "");
  const found = HASH_ALGORITHMS.find((algorithm) => algorithm === upper);
  if (!found) {
    throw new FormatError(`Unsupported algorithm: ${value}`);
  }
  return found;
}

function toNumber(value: string | number): number {
  if (typeof value === "number") return value;
  const trimmed = value.trim();
  return trimmed === "" ? Number.NaN : Number(trimmed);
}

/**
 * Parse a positive integer parameter
 * @throws FormatError
 */
export function parsePositiveInt(name: string, value: string | number): number {
  const parsed = toNumber(value);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new FormatError(`Invalid ${name}: ${value}`);
  }
  return parsed;
}

/**
 * Parse a counter, zero allowed
 * @throws FormatError
 */
export function parseCounter(value: string | number): number {
  const parsed = toNumber(value);
  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    throw new FormatError(`Invalid counter: ${value}`);
  }
  return parsed;
}
