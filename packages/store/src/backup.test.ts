/**
 * Tests for backup import and export
 */

import fs from "fs";
import os from "os";
import path from "path";
import { InvalidTokenTypeError, Secret, Token } from "@otpkeep/otp";
import {
  BackupFormatError,
  backupRecordFromToken,
  buildBackup,
  tokensFromBackup,
} from "./backup";
import { TokenStore } from "./token-store";

const hello = Secret.fromBase32("JBSWY3DPEHPK3PXP");
// 48656c6c6f21deadbeef
const helloBytes = [72, 101, 108, 108, 111, 33, 222, 173, 190, 239];

function record(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    type: "TOTP",
    algo: "SHA1",
    counter: 0,
    digits: 6,
    issuerInt: "ACME",
    issuerExt: "ACME",
    label: "alice",
    period: 30,
    secret: helloBytes,
    ...overrides,
  };
}

let dir: string;
let store: TokenStore;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "otpkeep-backup-"));
  store = TokenStore.open(path.join(dir, "tokens.db"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("backupRecordFromToken", () => {
  it("should write the secret as byte values", () => {
    const token = new Token({ issuer: "ACME", label: "alice", secret: hello });
    expect(backupRecordFromToken(token)).toEqual({
      type: "TOTP",
      algo: "SHA1",
      counter: null,
      digits: 6,
      issuerInt: "ACME",
      issuerExt: "ACME",
      label: "alice",
      period: 30,
      secret: helloBytes,
    });
  });

  it("should write SecurID fields only when set", () => {
    const token = new Token({
      type: "SecurID",
      serial: "000123456789",
      secret: hello,
    });
    const written = backupRecordFromToken(token);
    expect(written.serial).toBe("000123456789");
    expect("pin" in written).toBe(false);
    expect("exp_date" in written).toBe(false);
  });
});

describe("buildBackup", () => {
  it("should list issuer:label keys in order", () => {
    const backup = buildBackup([
      new Token({ issuer: "ACME", label: "alice", secret: hello }),
      new Token({ label: "bob", secret: hello }),
      new Token({ issuer: "Example", secret: hello }),
    ]);
    expect(backup.tokenOrder).toEqual(["ACME:alice", ":bob", "Example:"]);
    expect(backup.tokens).toHaveLength(3);
  });
});

describe("tokensFromBackup", () => {
  it("should accept signed byte values", () => {
    const [token] = tokensFromBackup({
      tokens: [record({ secret: [-1, 0, 127, -128] })],
    });
    expect(token.secret.toIntList()).toEqual([255, 0, 127, 128]);
  });

  it("should fill defaults for missing fields", () => {
    const [token] = tokensFromBackup({
      tokens: [{ type: "hotp", secret: helloBytes }],
    });
    expect(token.type).toBe("HOTP");
    expect(token.algorithm).toBe("SHA1");
    expect(token.digits).toBe(6);
    expect(token.period).toBe(30);
    expect(token.counter).toBe(0);
    expect(token.issuer).toBeNull();
  });

  it("should keep diverging issuer fields", () => {
    const [token] = tokensFromBackup({
      tokens: [record({ issuerInt: "acme-int", issuerExt: "ACME" })],
    });
    expect(token.issuerInt).toBe("acme-int");
    expect(token.issuerExt).toBe("ACME");
    expect(token.issuer).toBe("acme-int");
  });

  it("should keep empty issuer fields", () => {
    const [token] = tokensFromBackup({
      tokens: [record({ issuerInt: "", issuerExt: "Ext" })],
    });
    expect(token.issuerInt).toBe("");
    expect(token.issuerExt).toBe("Ext");
    expect(token.issuer).toBe("Ext");
  });

  it("should reject a document without tokens", () => {
    expect(() => tokensFromBackup({ tokenOrder: [] })).toThrow(
      BackupFormatError,
    );
    expect(() => tokensFromBackup([])).toThrow(BackupFormatError);
  });

  it("should report the index of a bad record", () => {
    let error: unknown;
    try {
      tokensFromBackup({ tokens: [record(), record({ secret: "abc" })] });
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(BackupFormatError);
    if (error instanceof BackupFormatError) {
      expect(error.index).toBe(1);
      expect(error.message).toBe("Token #1: secret must be a list of bytes");
    }
  });

  it("should wrap parameter errors", () => {
    expect(() =>
      tokensFromBackup({ tokens: [record({ algo: "SHA3" })] }),
    ).toThrow(BackupFormatError);
    expect(() =>
      tokensFromBackup({ tokens: [record({ secret: [1.5] })] }),
    ).toThrow(BackupFormatError);
  });

  it("should reject an unknown type", () => {
    expect(() =>
      tokensFromBackup({ tokens: [record({ type: "YUBIKEY" })] }),
    ).toThrow(InvalidTokenTypeError);
  });
});

describe("TokenStore backups", () => {
  it("should import every record", () => {
    const count = store.importBackup({
      tokenOrder: ["ACME:alice", ":bob"],
      tokens: [record(), record({ issuerInt: null, issuerExt: null, label: "bob" })],
    });
    expect(count).toBe(2);
    expect(store.list().map(String)).toEqual(["ACME:alice", "bob"]);
  });

  it("should append unless asked to delete existing tokens", () => {
    store.insert(new Token({ label: "old", secret: hello }));
    store.importBackup({ tokens: [record()] });
    expect(store.list().map(String)).toEqual(["old", "ACME:alice"]);

    store.importBackup({ tokens: [record({ label: "new" })] }, true);
    expect(store.list().map(String)).toEqual(["ACME:new"]);
  });

  it("should write nothing when a record is malformed", () => {
    store.insert(new Token({ label: "old", secret: hello }));
    expect(() =>
      store.importBackup(
        { tokens: [record(), record({ digits: "six" })] },
        true,
      ),
    ).toThrow(BackupFormatError);
    expect(store.list().map(String)).toEqual(["old"]);
  });

  it("should round trip through a file", () => {
    store.insert(
      new Token({
        type: "HOTP",
        algorithm: "SHA512",
        counter: 7,
        digits: 8,
        issuer: "ACME",
        label: "alice",
        secret: hello,
      }),
    );
    store.insert(
      new Token({ issuerInt: "int", issuerExt: "ext", label: "bob", secret: hello }),
    );
    const file = path.join(dir, "out", "backup.json");
    expect(store.exportBackup(file)).toBe(2);

    const written: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
    expect(written).toMatchObject({ tokenOrder: ["ACME:alice", "int:bob"] });

    const other = TokenStore.open(path.join(dir, "other.db"));
    expect(other.importBackupFile(file)).toBe(2);
    expect(other.toBackup()).toEqual(store.toBackup());
  });

  it("should export empty issuer fields as imported", () => {
    store.importBackup({
      tokens: [record({ issuerInt: "", issuerExt: "Ext" })],
    });
    const backup = store.toBackup();
    expect(backup.tokens[0].issuerInt).toBe("");
    expect(backup.tokens[0].issuerExt).toBe("Ext");
    expect(backup.tokenOrder).toEqual([":alice"]);
  });

  it("should reject a file that is not JSON", () => {
    const file = path.join(dir, "broken.json");
    fs.writeFileSync(file, "{ tokens: ");
    expect(() => store.importBackupFile(file)).toThrow(BackupFormatError);
    expect(store.list()).toEqual([]);
  });
});
