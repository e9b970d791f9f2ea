/**
 * @otpkeep/otp - Base32
 *
 * RFC 4648 Base32, the encoding authenticator apps show secrets in.
 *
 * @packageDocumentation
 */

import { FormatError } from "./errors";

const BASE32_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567";

/**
 * Unpadded lengths that cannot come out of an encoder (mod 8)
 */
const IMPOSSIBLE_TAILS = new Set([1, 3, 6]);

/**
 * Encode bytes to base32, without padding
 * @param buffer Bytes to encode
 * @returns Base32 string
 */
export function base32Encode(buffer: Uint8Array): string {
  let bits = 0;
  let value = 0;
  let output = "";

  for (const byte of buffer) {
    value = ((value << 8) | byte) & 0xffff;
    bits += 8;

    while (bits >= 5) {
      output += BASE32_ALPHABET[(value >>> (bits - 5)) & 31];
      bits -= 5;
    }
  }

  if (bits > 0) {
    output += BASE32_ALPHABET[(value << (5 - bits)) & 31];
  }

  return output;
}

/**
 * Normalize user input: drop whitespace, uppercase, pad to a multiple of 8
 */
export function normalizeBase32(input: string): string {
  const compact = input.replace(/\s+/g, "").toUpperCase();
  const remainder = compact.length % 8;
  return remainder ? compact + "=".repeat(8 - remainder) : compact;
}

/**
 * Decode base32 to bytes
 * @param input Base32 string, any case, spaces and padding allowed
 * @returns Decoded bytes
 * @throws FormatError on characters outside the alphabet or bad length
 */
export function base32Decode(input: string): Buffer {
  const cleanInput = normalizeBase32(input).replace(/=+$/, "");

  if (IMPOSSIBLE_TAILS.has(cleanInput.length % 8)) {
    throw new FormatError(`Invalid base32 length: ${cleanInput.length}`);
  }

  const bytes: number[] = [];
  let bits = 0;
  let value = 0;

  for (const char of cleanInput) {
    const idx = BASE32_ALPHABET.indexOf(char);
    if (idx === -1) {
      throw new FormatError(`Invalid base32 character: ${char}`);
    }

    value = ((value << 5) | idx) & 0xffff;
    bits += 5;

    if (bits >= 8) {
      bytes.push((value >>> (bits - 8)) & 255);
      bits -= 8;
    }
  }

  return Buffer.from(bytes);
}
