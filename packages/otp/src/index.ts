/**
 * @otpkeep/otp
 *
 * One-time password engine: HOTP (RFC 4226) and TOTP (RFC 6238) codes,
 * shared secret encodings and otpauth:// URIs. Compatible with the
 * secrets of Google Authenticator, FreeOTP and other RFC apps.
 *
 * @packageDocumentation
 */

export { base32Encode, base32Decode, normalizeBase32 } from "./base32";
export { Secret } from "./secret";
export { counterBytes, timeCounter, generateOtp } from "./hotp";
export {
  parseTokenType,
  parseAlgorithm,
  parsePositiveInt,
  parseCounter,
} from "./params";
export {
  OTPAUTH_SCHEME,
  buildOtpAuthUri,
  parseOtpAuthUri,
  displayLabel,
  type OtpAuthParams,
} from "./uri";
export {
  Token,
  unavailableCode,
  type Timestamp,
  type TokenOptions,
} from "./token";
export {
  OtpError,
  FormatError,
  InvalidTokenTypeError,
  UnsupportedCapabilityError,
  NotFoundError,
  exitCodeFor,
  EXIT_SUCCESS,
  EXIT_FAILURE,
  EXIT_USAGE_ERROR,
} from "./errors";
export {
  TOKEN_TYPES,
  HASH_ALGORITHMS,
  DEFAULT_PERIOD,
  DEFAULT_DIGITS,
  DEFAULT_ALGORITHM,
  type TokenType,
  type HashAlgorithm,
  type SecretEncoding,
  type TokenFields,
  type TokenRecord,
  type TokenDict,
  type SecuridComputer,
  type TokenRemover,
} from "./types";
