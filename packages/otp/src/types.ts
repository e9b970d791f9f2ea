/**
 * @otpkeep/otp - Types
 *
 * @packageDocumentation
 */

import type { Secret } from "./secret";

export const TOKEN_TYPES = ["TOTP", "HOTP", "SecurID"] as const;

/**
 * Code generation scheme of a token
 */
export type TokenType = (typeof TOKEN_TYPES)[number];

export const HASH_ALGORITHMS = ["SHA1", "SHA256", "SHA512", "MD5"] as const;

/**
 * HMAC hash of a token
 */
export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

export const DEFAULT_PERIOD = 30;
export const DEFAULT_DIGITS = 6;
export const DEFAULT_ALGORITHM: HashAlgorithm = "SHA1";

/**
 * Encoding used for the secret in {@link TokenDict}
 */
export type SecretEncoding = "INT_LIST" | "HEX" | "BASE32";

/**
 * Explicit field values for a new token
 */
export interface TokenFields {
  rowid?: number;
  type?: TokenType;
  algorithm?: HashAlgorithm;
  counter?: number | null;
  digits?: number;
  /** Sets issuerInt/issuerExt when they are not given */
  issuer?: string | null;
  issuerInt?: string | null;
  issuerExt?: string | null;
  label?: string | null;
  period?: number;
  expDate?: string | null;
  pin?: string | null;
  serial?: string | null;
  /** Required: a token never falls back to an empty key */
  secret: Secret;
}

/**
 * Persisted token row, column names as stored
 */
export interface TokenRecord {
  rowid?: number | null;
  type: string;
  algo?: string | null;
  counter?: number | null;
  digits?: number | null;
  issuer_int?: string | null;
  issuer_ext?: string | null;
  label?: string | null;
  period?: number | null;
  exp_date?: string | null;
  pin?: string | null;
  serial?: string | null;
  /** Base32 */
  secret: string;
}

/**
 * Plain object view of a token
 */
export interface TokenDict {
  type: TokenType;
  algorithm: HashAlgorithm;
  counter: number | null;
  digits: number;
  issuer: string | null;
  label: string | null;
  period: number;
  secret: number[] | string;
  exp_date?: string;
  pin?: string;
  serial?: string;
}

/**
 * External SecurID computation, injected where available
 */
export interface SecuridComputer {
  /** Current code for the token */
  now(data: TokenDict): string;
  /** Seconds until the next code */
  timeLeft?(data: TokenDict, forTime?: Date): number | null;
}

/**
 * What a loaded token needs from its store to delete itself
 */
export interface TokenRemover {
  delete(rowid: number): boolean;
}
