/**
 * @otpkeep/otp - Token
 *
 * One enrolled credential: algorithm parameters, identity and secret.
 * Built from explicit fields, a stored record or an otpauth:// URI.
 *
 * @packageDocumentation
 */

import type { Logger } from "@otpkeep/types";
import { UnsupportedCapabilityError } from "./errors";
import { generateOtp, timeCounter } from "./hotp";
import {
  parseAlgorithm,
  parseCounter,
  parsePositiveInt,
  parseTokenType,
} from "./params";
import { Secret } from "./secret";
import {
  DEFAULT_ALGORITHM,
  DEFAULT_DIGITS,
  DEFAULT_PERIOD,
} from "./types";
import type {
  HashAlgorithm,
  SecretEncoding,
  SecuridComputer,
  TokenDict,
  TokenFields,
  TokenRecord,
  TokenRemover,
  TokenType,
} from "./types";
import { buildOtpAuthUri, displayLabel, parseOtpAuthUri } from "./uri";

/**
 * Point in time: a Date or Unix seconds
 */
export type Timestamp = Date | number;

export interface TokenOptions {
  /** Store the token was loaded from, needed by {@link Token.delete} */
  store?: TokenRemover;
  /** SecurID implementation, when one is installed */
  securid?: SecuridComputer;
  logger?: Logger;
}

/**
 * Code shown when a token cannot be computed
 */
export function unavailableCode(digits: number): string {
  return "?".repeat(digits);
}

function unixSeconds(timestamp: Timestamp): number {
  return timestamp instanceof Date
    ? Math.floor(timestamp.getTime() / 1000)
    : Math.floor(timestamp);
}

function secondOfMinute(timestamp: Timestamp): number {
  if (timestamp instanceof Date) return timestamp.getUTCSeconds();
  return ((Math.floor(timestamp) % 60) + 60) % 60;
}

function titleCase(key: string): string {
  return key.replace(/(^|[^a-z])([a-z])/g, (_, before: string, letter: string) =>
    before + letter.toUpperCase(),
  );
}

export class Token {
  rowid?: number;
  type: TokenType;
  algorithm: HashAlgorithm;
  counter: number | null;
  digits: number;
  issuer: string | null;
  issuerInt: string | null;
  issuerExt: string | null;
  label: string | null;
  period: number;
  expDate: string | null;
  pin: string | null;
  serial: string | null;
  secret: Secret;

  store?: TokenRemover;
  private readonly securid?: SecuridComputer;
  private readonly logger?: Logger;

  constructor(fields: TokenFields, options: TokenOptions = {}) {
    this.store = options.store;
    this.securid = options.securid;
    this.logger = options.logger;

    this.rowid = fields.rowid;
    this.type = fields.type ?? "TOTP";
    this.algorithm = fields.algorithm ?? DEFAULT_ALGORITHM;
    this.digits = parsePositiveInt("digits", fields.digits ?? DEFAULT_DIGITS);
    this.period = parsePositiveInt("period", fields.period ?? DEFAULT_PERIOD);

    const counter = fields.counter ?? (this.type === "HOTP" ? 0 : null);
    this.counter = counter === null ? null : parseCounter(counter);

    // issuer fills whichever legacy field is missing; given ones, "" too,
    // are kept as they are
    this.issuer = fields.issuer ?? null;
    this.issuerInt = fields.issuerInt ?? this.issuer;
    this.issuerExt = fields.issuerExt ?? this.issuer;
    if (!this.issuer) {
      this.issuer = this.issuerInt || this.issuerExt || null;
    }

    this.label = fields.label ?? null;
    this.expDate = fields.expDate ?? null;
    this.pin = fields.pin ?? null;
    this.serial = fields.serial ?? null;
    this.secret = fields.secret;
  }

  /**
   * Build from a stored row
   * @throws InvalidTokenTypeError, FormatError
   */
  static fromRecord(record: TokenRecord, options: TokenOptions = {}): Token {
    return new Token(
      {
        rowid: record.rowid ?? undefined,
        type: parseTokenType(record.type),
        algorithm: record.algo ? parseAlgorithm(record.algo) : undefined,
        counter: record.counter,
        digits: record.digits || undefined,
        issuerInt: record.issuer_int,
        issuerExt: record.issuer_ext,
        label: record.label,
        period: record.period || undefined,
        expDate: record.exp_date,
        pin: record.pin,
        serial: record.serial,
        secret: Secret.fromBase32(record.secret),
      },
      options,
    );
  }

  /**
   * Build a transient token from an otpauth:// URI
   * @throws InvalidTokenTypeError, FormatError
   */
  static fromURI(uri: string, options: TokenOptions = {}): Token {
    return new Token(parseOtpAuthUri(uri), options);
  }

  /**
   * Set the issuer and both legacy issuer fields
   */
  setIssuer(issuer: string | null): void {
    this.issuer = issuer;
    this.issuerInt = issuer;
    this.issuerExt = issuer;
  }

  /**
   * Compute the code
   * @param timestamp TOTP: time to compute for (default: now)
   * @param counter HOTP: counter to use instead of the stored one
   * @returns Zero-padded code of `digits` characters
   */
  calculate(timestamp?: Timestamp, counter?: number): string {
    switch (this.type) {
      case "SecurID":
        return this.calculateSecurid();
      case "HOTP":
        return generateOtp(
          this.secret.toBytes(),
          counter ?? this.counter ?? 0,
          this.algorithm,
          this.digits,
        );
      case "TOTP":
        return generateOtp(
          this.secret.toBytes(),
          timeCounter(unixSeconds(timestamp ?? new Date()), this.period),
          this.algorithm,
          this.digits,
        );
    }
  }

  /**
   * Seconds until the next code, never 0: a step that just started
   * reports the full period. `null` where no time step applies.
   */
  timeLeft(forTime?: Timestamp): number | null {
    switch (this.type) {
      case "SecurID":
        return this.securidTimeLeft(forTime);
      case "HOTP":
        return null;
      case "TOTP": {
        const second = secondOfMinute(forTime ?? new Date());
        const left = (((this.period - second) % this.period) + this.period) % this.period;
        return left === 0 ? this.period : left;
      }
    }
  }

  /**
   * Pick the glyph matching the time left
   * @param glyphs Glyphs from empty to full
   */
  spinner(glyphs: string, forTime?: Timestamp): string {
    const chars = Array.from(glyphs);
    if (chars.length === 0) return "";
    const left = this.timeLeft(forTime);
    if (left === null) return "";
    const index = Math.min(
      Math.floor((left * chars.length) / this.period),
      chars.length - 1,
    );
    return chars[index];
  }

  toURI(): string {
    return buildOtpAuthUri(this);
  }

  toDict(encoding: SecretEncoding = "INT_LIST"): TokenDict {
    const dict: TokenDict = {
      type: this.type,
      algorithm: this.algorithm,
      counter: this.counter,
      digits: this.digits,
      issuer: this.issuer,
      label: this.label,
      period: this.period,
      secret: this.encodeSecret(encoding),
    };
    if (this.expDate !== null) dict.exp_date = this.expDate;
    if (this.pin !== null) dict.pin = this.pin;
    if (this.serial !== null) dict.serial = this.serial;
    return dict;
  }

  /** `JSON.stringify(token)` writes the int list dict */
  toJSON(): TokenDict {
    return this.toDict();
  }

  /**
   * One `Key:      value` line per field, secret in Base32
   */
  details(): string {
    return Object.entries(this.toDict("BASE32"))
      .map(
        ([key, value]) =>
          `${(titleCase(key) + ":").padEnd(10)} ${value ?? "-"}`,
      )
      .join("\n");
  }

  /**
   * Remove this token from the store it was loaded from
   * @returns false when the token was never persisted
   */
  delete(): boolean {
    if (this.rowid === undefined || !this.store) {
      return false;
    }
    return this.store.delete(this.rowid);
  }

  toString(): string {
    if (this.issuer || this.label) {
      return displayLabel(this.issuer, this.label);
    }
    if (this.rowid !== undefined) {
      return `#${this.rowid}`;
    }
    return "?";
  }

  private encodeSecret(encoding: SecretEncoding): number[] | string {
    switch (encoding) {
      case "INT_LIST":
        return this.secret.toIntList();
      case "HEX":
        return this.secret.toHex();
      case "BASE32":
        return this.secret.toBase32();
    }
  }

  private requireSecurid(): SecuridComputer {
    if (!this.securid) {
      throw new UnsupportedCapabilityError(
        "SecurID computation is not available",
      );
    }
    return this.securid;
  }

  private calculateSecurid(): string {
    try {
      return this.requireSecurid().now(this.toDict());
    } catch (e) {
      this.logger?.warn(`Cannot compute code for ${this.toString()}: ${e}`);
      return unavailableCode(this.digits);
    }
  }

  private securidTimeLeft(forTime?: Timestamp): number | null {
    try {
      const computer = this.requireSecurid();
      if (!computer.timeLeft) return null;
      const date =
        forTime === undefined
          ? undefined
          : forTime instanceof Date
            ? forTime
            : new Date(unixSeconds(forTime) * 1000);
      return computer.timeLeft(this.toDict(), date);
    } catch (e) {
      this.logger?.debug(`No time left for ${this.toString()}: ${e}`);
      return null;
    }
  }
}
