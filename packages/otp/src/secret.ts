/**
 * @otpkeep/otp - Secret
 *
 * Immutable shared key with hex, Base32 and integer list conversions
 *
 * @packageDocumentation
 */

import { base32Decode, base32Encode } from "./base32";
import { FormatError } from "./errors";

export class Secret {
  private readonly bytes: Buffer;

  constructor(bytes: Uint8Array = new Uint8Array()) {
    this.bytes = Buffer.from(bytes);
  }

  /**
   * Decode hex digit pairs; whitespace between digits is ignored
   */
  static fromHex(hex: string): Secret {
    const compact = hex.replace(/\s+/g, "");
    if (compact.length % 2 !== 0) {
      throw new FormatError("Invalid hex secret: odd number of digits");
    }
    if (!/^[0-9a-fA-F]*$/.test(compact)) {
      throw new FormatError("Invalid hex secret: non-hex character");
    }
    return new Secret(Buffer.from(compact, "hex"));
  }

  static fromBase32(base32: string): Secret {
    return new Secret(base32Decode(base32));
  }

  /**
   * Build from byte values; signed bytes (-128..127) are folded modulo 256
   */
  static fromIntList(values: readonly number[]): Secret {
    return new Secret(
      Uint8Array.from(values, (value) => {
        if (!Number.isInteger(value)) {
          throw new FormatError(`Invalid secret byte: ${value}`);
        }
        return ((value % 256) + 256) % 256;
      }),
    );
  }

  toHex(): string {
    return this.bytes.toString("hex");
  }

  /** Uppercase, unpadded */
  toBase32(): string {
    return base32Encode(this.bytes);
  }

  toIntList(): number[] {
    return Array.from(this.bytes);
  }

  toBytes(): Buffer {
    return Buffer.from(this.bytes);
  }

  get length(): number {
    return this.bytes.length;
  }

  equals(other: Secret | null | undefined): boolean {
    return other instanceof Secret && this.bytes.equals(other.bytes);
  }

  toString(): string {
    return this.toHex();
  }
}
