/**
 * Tests for otpauth:// URIs
 */

import { FormatError, InvalidTokenTypeError } from "./errors";
import { Secret } from "./secret";
import { Token } from "./token";
import { parseOtpAuthUri } from "./uri";

const secret = Secret.fromBase32("JBSWY3DPEHPK3PXP");

describe("OTP Auth URI generation", () => {
  it("should write TOTP parameters", () => {
    const token = new Token({
      issuer: "ACME Co",
      label: "alice@example.com",
      algorithm: "SHA256",
      digits: 8,
      period: 60,
      secret,
    });
    expect(token.toURI()).toBe(
      "otpauth://totp/ACME%20Co:alice%40example.com?secret=JBSWY3DPEHPK3PXP&algorithm=SHA256&digits=8&period=60",
    );
  });

  it("should write the HOTP counter, zero included, and no period", () => {
    const token = new Token({ type: "HOTP", label: "bob", secret });
    expect(token.toURI()).toBe(
      "otpauth://hotp/bob?secret=JBSWY3DPEHPK3PXP&algorithm=SHA1&digits=6&counter=0",
    );
  });

  it("should omit the colon without issuer", () => {
    const token = new Token({ label: " carol ", secret });
    expect(token.toURI()).toMatch(/^otpauth:\/\/totp\/carol\?/);
  });

  it("should use the securid host", () => {
    const token = new Token({ type: "SecurID", label: "vpn", secret });
    expect(token.toURI()).toBe(
      "otpauth://securid/vpn?secret=JBSWY3DPEHPK3PXP&algorithm=SHA1&digits=6&period=30",
    );
  });
});

describe("OTP Auth URI parsing", () => {
  it("should roundtrip a TOTP token", () => {
    const original = new Token({
      issuer: "ACME Co",
      label: "alice@example.com",
      algorithm: "SHA512",
      digits: 8,
      period: 45,
      secret,
    });
    const parsed = Token.fromURI(original.toURI());
    expect(parsed.type).toBe("TOTP");
    expect(parsed.algorithm).toBe("SHA512");
    expect(parsed.digits).toBe(8);
    expect(parsed.period).toBe(45);
    expect(parsed.issuer).toBe("ACME Co");
    expect(parsed.label).toBe("alice@example.com");
    expect(parsed.secret.equals(secret)).toBe(true);
    expect(parsed.rowid).toBeUndefined();
  });

  it("should roundtrip a HOTP counter", () => {
    const original = new Token({ type: "HOTP", counter: 17, label: "bob", secret });
    const parsed = Token.fromURI(original.toURI());
    expect(parsed.type).toBe("HOTP");
    expect(parsed.counter).toBe(17);
  });

  it("should roundtrip a colon inside the label", () => {
    const original = new Token({ label: "alice:work", secret });
    expect(original.toURI()).toBe(
      "otpauth://totp/alice%3Awork?secret=JBSWY3DPEHPK3PXP&algorithm=SHA1&digits=6&period=30",
    );
    const parsed = Token.fromURI(original.toURI());
    expect(parsed.issuer).toBeNull();
    expect(parsed.label).toBe("alice:work");
  });

  it("should roundtrip a colon inside the issuer", () => {
    const original = new Token({ issuer: "Acme:EU", label: "bob", secret });
    const parsed = Token.fromURI(original.toURI());
    expect(parsed.issuer).toBe("Acme:EU");
    expect(parsed.label).toBe("bob");
  });

  it("should apply defaults", () => {
    const fields = parseOtpAuthUri(
      "otpauth://TOTP/Example:alice?secret=jbswy3dpehpk3pxp",
    );
    expect(fields).toEqual({
      type: "TOTP",
      algorithm: "SHA1",
      digits: 6,
      period: 30,
      counter: null,
      issuer: "Example",
      label: "alice",
      secret,
    });
  });

  it("should default the HOTP counter to zero", () => {
    expect(parseOtpAuthUri("otpauth://hotp/bob?secret=JBSWY3DPEHPK3PXP").counter).toBe(0);
  });

  it("should read the issuer parameter when the path has none", () => {
    const fields = parseOtpAuthUri(
      "otpauth://totp/alice?secret=JBSWY3DPEHPK3PXP&issuer=Example",
    );
    expect(fields.issuer).toBe("Example");
    expect(fields.label).toBe("alice");
  });

  it("should split on the first colon only", () => {
    const fields = parseOtpAuthUri(
      "otpauth://totp/Example:alice:work?secret=JBSWY3DPEHPK3PXP",
    );
    expect(fields.issuer).toBe("Example");
    expect(fields.label).toBe("alice:work");
  });

  it("should normalise the algorithm name", () => {
    expect(
      parseOtpAuthUri("otpauth://totp/a?secret=JBSWY3DPEHPK3PXP&algorithm=sha-256")
        .algorithm,
    ).toBe("SHA256");
  });

  it("should reject unknown token types", () => {
    expect(() =>
      parseOtpAuthUri("otpauth://motp/a?secret=JBSWY3DPEHPK3PXP"),
    ).toThrow(InvalidTokenTypeError);
  });

  it("should reject malformed input", () => {
    expect(() => parseOtpAuthUri("not a uri")).toThrow(FormatError);
    expect(() => parseOtpAuthUri("https://totp/a?secret=JBSWY3DP")).toThrow(
      FormatError,
    );
    expect(() => parseOtpAuthUri("otpauth://totp/a")).toThrow(FormatError);
    expect(() =>
      parseOtpAuthUri("otpauth://totp/a?secret=JBSWY3DP&digits=six"),
    ).toThrow(FormatError);
    expect(() =>
      parseOtpAuthUri("otpauth://totp/a?secret=JBSWY3DP&algorithm=SHA3"),
    ).toThrow(FormatError);
    expect(() => parseOtpAuthUri("otpauth://totp/a?secret=0000")).toThrow(
      FormatError,
    );
  });
});
