/**
 * @otpkeep/otp - Errors
 *
 * @packageDocumentation
 */

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE_ERROR = 2;

/**
 * Base class of every error raised by otpkeep packages
 */
export class OtpError extends Error {
  readonly code: string = "OTP_ERROR";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed secret encoding or unsupported parameter value
 */
export class FormatError extends OtpError {
  override readonly code: string = "FORMAT_ERROR";
}

/**
 * Token type outside TOTP, HOTP and SecurID
 */
export class InvalidTokenTypeError extends OtpError {
  override readonly code = "INVALID_TOKEN_TYPE";

  constructor(readonly tokenType: string) {
    super(`Invalid token type: ${tokenType}`);
  }
}

/**
 * An optional capability (SecurID computation) is not installed
 */
export class UnsupportedCapabilityError extends OtpError {
  override readonly code = "UNSUPPORTED_CAPABILITY";
}

/**
 * Addressed token does not exist
 */
export class NotFoundError extends OtpError {
  override readonly code = "NOT_FOUND";
}

/**
 * Map an error to the exit code a command line front end should use
 */
export function exitCodeFor(error: unknown): number {
  if (error === undefined || error === null) return EXIT_SUCCESS;
  if (error instanceof FormatError || error instanceof InvalidTokenTypeError) {
    return EXIT_USAGE_ERROR;
  }
  return EXIT_FAILURE;
}
