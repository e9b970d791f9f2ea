/**
 * @otpkeep/otp - otpauth:// URI codec
 *
 * `otpauth://{totp|hotp|securid}/{issuer:label}?secret=...&algorithm=...`
 *
 * @packageDocumentation
 */

import { FormatError } from "./errors";
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
import type { HashAlgorithm, TokenFields, TokenType } from "./types";

export const OTPAUTH_SCHEME = "otpauth:";

/**
 * Fields needed to write a URI
 */
export interface OtpAuthParams {
  type: TokenType;
  algorithm: HashAlgorithm;
  digits: number;
  period: number;
  counter: number | null;
  issuer: string | null;
  label: string | null;
  secret: Secret;
}

/**
 * `issuer:label`, or just the one present, each part trimmed
 */
export function displayLabel(
  issuer: string | null,
  label: string | null,
): string {
  return [issuer, label]
    .filter((part): part is string => Boolean(part))
    .map((part) => part.trim())
    .join(":");
}

/**
 * Build an otpauth:// URI
 * HOTP URIs carry the counter (zero included) and no period.
 */
export function buildOtpAuthUri(params: OtpAuthParams): string {
  const path = [params.issuer, params.label]
    .filter((part): part is string => Boolean(part))
    .map((part) => encodeURIComponent(part.trim()))
    .join(":");

  const query = new URLSearchParams();
  query.set("secret", params.secret.toBase32());
  query.set("algorithm", params.algorithm);
  query.set("digits", String(params.digits));

  switch (params.type) {
    case "HOTP":
      query.set("counter", String(params.counter ?? 0));
      break;
    case "TOTP":
    case "SecurID":
      query.set("period", String(params.period));
      break;
  }

  return `otpauth://${params.type.toLowerCase()}/${path}?${query.toString()}`;
}

function decodePart(part: string): string | null {
  try {
    return decodeURIComponent(part).trim() || null;
  } catch (e) {
    throw new FormatError(`Invalid URI label: ${part}`, { cause: e });
  }
}

/**
 * Parse an otpauth:// URI into token fields
 * @throws InvalidTokenTypeError when the host is not a known type
 * @throws FormatError on a malformed URI, parameter or secret
 */
export function parseOtpAuthUri(uri: string): TokenFields {
  let url: URL;
  try {
    url = new URL(uri.trim());
  } catch (e) {
    throw new FormatError(`Invalid URI: ${uri}`, { cause: e });
  }
  if (url.protocol !== OTPAUTH_SCHEME) {
    throw new FormatError(`Not an otpauth URI: ${uri}`);
  }

  const type = parseTokenType(url.hostname);
  const query = url.searchParams;

  // split before decoding: a %3A inside a part is not the separator
  const path = url.pathname.replace(/^\/+/, "");
  const separator = path.indexOf(":");
  let issuer: string | null;
  let label: string | null;
  if (separator >= 0) {
    issuer = decodePart(path.slice(0, separator));
    label = decodePart(path.slice(separator + 1));
  } else {
    issuer = query.get("issuer") || null;
    label = decodePart(path);
  }

  const secret = query.get("secret");
  if (!secret) {
    throw new FormatError("Missing secret in URI");
  }

  const algorithm = query.get("algorithm");
  const digits = query.get("digits");
  const period = query.get("period");
  const counter = query.get("counter");

  return {
    type,
    algorithm: algorithm ? parseAlgorithm(algorithm) : DEFAULT_ALGORITHM,
    digits: digits ? parsePositiveInt("digits", digits) : DEFAULT_DIGITS,
    period: period ? parsePositiveInt("period", period) : DEFAULT_PERIOD,
    counter: counter ? parseCounter(counter) : type === "HOTP" ? 0 : null,
    issuer,
    label,
    secret: Secret.fromBase32(secret),
  };
}
