/**
 * Tests for Secret
 */

import { FormatError } from "./errors";
import { Secret } from "./secret";

const RFC_HEX = "3132333435363738393031323334353637383930";
const RFC_BASE32 = "GEZDGNBVGY3TQOJQGEZDGNBVGY3TQOJQ";
const RFC_BYTES = [
  49, 50, 51, 52, 53, 54, 55, 56, 57, 48, 49, 50, 51, 52, 53, 54, 55, 56, 57,
  48,
];

describe("Secret", () => {
  describe("conversions", () => {
    const secret = Secret.fromHex(RFC_HEX);

    it("should expose bytes as an int list", () => {
      expect(secret.toIntList()).toEqual(RFC_BYTES);
      expect(secret.length).toBe(20);
    });

    it("should encode to base32", () => {
      expect(secret.toBase32()).toBe(RFC_BASE32);
    });

    it("should encode to hex", () => {
      expect(secret.toHex()).toBe(RFC_HEX);
      expect(String(secret)).toBe(RFC_HEX);
    });

    it("should return a copy of the bytes", () => {
      const bytes = secret.toBytes();
      bytes[0] = 0;
      expect(secret.toIntList()[0]).toBe(49);
    });
  });

  describe("fromHex", () => {
    it("should ignore whitespace", () => {
      expect(Secret.fromHex("31 32\n33").toIntList()).toEqual([49, 50, 51]);
    });

    it("should reject odd length", () => {
      expect(() => Secret.fromHex("123")).toThrow(FormatError);
    });

    it("should reject non-hex characters", () => {
      expect(() => Secret.fromHex("zz")).toThrow(FormatError);
    });
  });

  describe("fromBase32", () => {
    it("should accept spaced lowercase input", () => {
      const spaced = Secret.fromBase32("gezd gnbv gy3t qojq GEZD GNBV gy3t qojq");
      expect(spaced.equals(Secret.fromBase32(RFC_BASE32))).toBe(true);
    });

    it("should reject characters outside the alphabet", () => {
      expect(() => Secret.fromBase32("GEZDGNB1")).toThrow(FormatError);
    });
  });

  describe("fromIntList", () => {
    it("should fold signed bytes", () => {
      expect(Secret.fromIntList([-1, 255, 256, -128, 0]).toIntList()).toEqual([
        255, 255, 0, 128, 0,
      ]);
    });

    it("should reject non-integers", () => {
      expect(() => Secret.fromIntList([1.5])).toThrow(FormatError);
    });
  });

  describe("equality", () => {
    it("should compare bytes", () => {
      const s1 = Secret.fromHex(RFC_HEX);
      const s2 = Secret.fromIntList(RFC_BYTES);
      const s3 = Secret.fromBase32(RFC_BASE32);
      const s4 = Secret.fromHex("3132");
      expect(s1.equals(s2)).toBe(true);
      expect(s1.equals(s3)).toBe(true);
      expect(s1.equals(s4)).toBe(false);
      expect(s1.equals(undefined)).toBe(false);
    });
  });

  describe("roundtrip", () => {
    const samples = [
      Buffer.from([]),
      Buffer.from([0x00]),
      Buffer.from([0x00, 0xff, 0x12, 0x34, 0xab, 0xcd, 0x80]),
      Buffer.from("12345678901234567890123456789012"),
    ];

    it.each(samples)("should be lossless through every encoding", (bytes) => {
      const secret = new Secret(bytes);
      expect(Secret.fromHex(secret.toHex()).equals(secret)).toBe(true);
      expect(Secret.fromBase32(secret.toBase32()).equals(secret)).toBe(true);
      expect(Secret.fromIntList(secret.toIntList()).equals(secret)).toBe(true);
    });
  });
});
