/**
 * @otpkeep/otp - HOTP algorithm
 *
 * RFC 4226 HMAC one-time password. TOTP (RFC 6238) is the same computation
 * with the counter taken from the clock.
 *
 * @packageDocumentation
 */

import crypto from "crypto";
import { hotpDigestToToken } from "@otplib/core";
import { FormatError } from "./errors";
import type { HashAlgorithm } from "./types";

const NODE_DIGESTS: Record<HashAlgorithm, string> = {
  SHA1: "sha1",
  SHA256: "sha256",
  SHA512: "sha512",
  MD5: "md5",
};

/**
 * 8-byte big-endian moving factor
 */
export function counterBytes(counter: number): Buffer {
  if (!Number.isSafeInteger(counter)) {
    throw new FormatError(`Invalid counter: ${counter}`);
  }
  const buffer = Buffer.alloc(8);
  buffer.writeBigInt64BE(BigInt(counter));
  return buffer;
}

/**
 * Time step number for a Unix time in seconds
 */
export function timeCounter(seconds: number, period: number): number {
  return Math.floor(seconds / period);
}

/**
 * Compute a one-time password
 * @param key Shared secret bytes
 * @param counter Moving factor
 * @param algorithm HMAC hash
 * @param digits Code length
 * @returns Zero-padded decimal code
 * @throws FormatError when the truncation offset runs past the digest, which
 * only MD5 (16 bytes) can hit: offsets 13 to 15 leave fewer than 4 bytes
 */
export function generateOtp(
  key: Uint8Array,
  counter: number,
  algorithm: HashAlgorithm,
  digits: number,
): string {
  const digest = crypto
    .createHmac(NODE_DIGESTS[algorithm], key)
    .update(counterBytes(counter))
    .digest();

  // dynamic truncation: offset from the low nibble of the last byte
  const offset = digest[digest.length - 1] & 0xf;
  if (offset + 4 > digest.length) {
    throw new FormatError(
      `${algorithm} digest of ${digest.length} bytes has no 4 bytes at offset ${offset}`,
    );
  }
  return hotpDigestToToken(digest.toString("hex"), digits);
}
