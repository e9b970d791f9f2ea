/**
 * @otpkeep/store - Backup interchange format
 *
 * FreeOTP-compatible JSON: `{ tokenOrder: ["issuer:label", ...], tokens: [...] }`
 * with secrets as lists of (possibly signed) byte values.
 *
 * @packageDocumentation
 */

import {
  DEFAULT_ALGORITHM,
  DEFAULT_DIGITS,
  DEFAULT_PERIOD,
  FormatError,
  Secret,
  Token,
  parseAlgorithm,
  parseTokenType,
} from "@otpkeep/otp";
import type { TokenOptions, TokenType } from "@otpkeep/otp";

/**
 * A token as written in a backup file
 */
export interface BackupTokenRecord {
  type: TokenType;
  algo: string;
  counter: number | null;
  digits: number;
  issuerInt: string | null;
  issuerExt: string | null;
  label: string | null;
  period: number;
  /** Byte values, -128..127 or 0..255 */
  secret: number[];
  exp_date?: string;
  pin?: string;
  serial?: string;
}

export interface BackupFile {
  /** `issuer:label` keys in menu order */
  tokenOrder: string[];
  tokens: BackupTokenRecord[];
}

/**
 * A backup record that cannot be imported
 */
export class BackupFormatError extends FormatError {
  override readonly code: string = "BACKUP_FORMAT_ERROR";

  constructor(
    message: string,
    readonly index?: number,
    options?: ErrorOptions,
  ) {
    super(index === undefined ? message : `Token #${index}: ${message}`, options);
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(
  record: Record<string, unknown>,
  key: string,
  index: number,
): string | null {
  const value = record[key];
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") {
    throw new BackupFormatError(`${key} must be a string`, index);
  }
  return value;
}

function optionalInteger(
  record: Record<string, unknown>,
  key: string,
  index: number,
): number | null {
  const value = record[key];
  if (value === undefined || value === null) return null;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new BackupFormatError(`${key} must be an integer`, index);
  }
  return value;
}

function secretBytes(record: Record<string, unknown>, index: number): Secret {
  const value = record.secret;
  if (!Array.isArray(value)) {
    throw new BackupFormatError("secret must be a list of bytes", index);
  }
  const list: unknown[] = value;
  const bytes: number[] = [];
  for (const byte of list) {
    if (typeof byte !== "number" || !Number.isInteger(byte)) {
      throw new BackupFormatError("secret must be a list of bytes", index);
    }
    bytes.push(byte);
  }
  return Secret.fromIntList(bytes);
}

/**
 * Turn one backup record into a transient token
 * @throws BackupFormatError, InvalidTokenTypeError
 */
export function tokenFromBackupRecord(
  value: unknown,
  index: number,
  options: TokenOptions = {},
): Token {
  if (!isObject(value)) {
    throw new BackupFormatError("token must be an object", index);
  }
  if (typeof value.type !== "string") {
    throw new BackupFormatError("type is missing", index);
  }
  const type = parseTokenType(value.type);
  const algo = optionalString(value, "algo", index);

  try {
    return new Token(
      {
        type,
        algorithm: algo ? parseAlgorithm(algo) : DEFAULT_ALGORITHM,
        counter: optionalInteger(value, "counter", index),
        digits: optionalInteger(value, "digits", index) || DEFAULT_DIGITS,
        issuerInt: optionalString(value, "issuerInt", index),
        issuerExt: optionalString(value, "issuerExt", index),
        label: optionalString(value, "label", index),
        period: optionalInteger(value, "period", index) || DEFAULT_PERIOD,
        expDate: optionalString(value, "exp_date", index),
        pin: optionalString(value, "pin", index),
        serial: optionalString(value, "serial", index),
        secret: secretBytes(value, index),
      },
      options,
    );
  } catch (e) {
    if (e instanceof BackupFormatError || !(e instanceof FormatError)) throw e;
    throw new BackupFormatError(e.message, index, { cause: e });
  }
}

/**
 * Validate a parsed backup file and build its tokens; nothing is returned
 * unless every record is valid
 * @throws BackupFormatError, InvalidTokenTypeError
 */
export function tokensFromBackup(
  data: unknown,
  options: TokenOptions = {},
): Token[] {
  if (!isObject(data) || !Array.isArray(data.tokens)) {
    throw new BackupFormatError("backup must contain a tokens list");
  }
  const records: unknown[] = data.tokens;
  return records.map((record, index) =>
    tokenFromBackupRecord(record, index, options),
  );
}

/**
 * Backup record of a token, legacy issuer fields kept verbatim
 */
export function backupRecordFromToken(token: Token): BackupTokenRecord {
  const record: BackupTokenRecord = {
    type: token.type,
    algo: token.algorithm,
    counter: token.counter,
    digits: token.digits,
    issuerInt: token.issuerInt,
    issuerExt: token.issuerExt,
    label: token.label,
    period: token.period,
    secret: token.secret.toIntList(),
  };
  if (token.expDate !== null) record.exp_date = token.expDate;
  if (token.pin !== null) record.pin = token.pin;
  if (token.serial !== null) record.serial = token.serial;
  return record;
}

/**
 * Build the backup document for a list of tokens
 */
export function buildBackup(tokens: readonly Token[]): BackupFile {
  const records = tokens.map(backupRecordFromToken);
  return {
    tokenOrder: records.map(
      (record) => `${record.issuerInt ?? ""}:${record.label ?? ""}`,
    ),
    tokens: records,
  };
}
