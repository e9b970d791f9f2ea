/**
 * @otpkeep/store - Token store
 *
 * SQLite-backed token collection. Every operation opens the database,
 * runs in a transaction and closes the connection before returning, so
 * each list() sees the file as it is on disk.
 *
 * @packageDocumentation
 */

import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { silentLogger } from "@otpkeep/logger";
import { NotFoundError, Token } from "@otpkeep/otp";
import type { SecuridComputer, TokenRemover, TokenType } from "@otpkeep/otp";
import type { Logger } from "@otpkeep/types";
import { buildBackup, tokensFromBackup, BackupFormatError } from "./backup";
import type { BackupFile } from "./backup";
import {
  SQL_CREATE_TOKENS_TABLE,
  SQL_DELETE_TOKEN,
  SQL_DROP_TOKENS_TABLE,
  SQL_INSERT_TOKEN,
  SQL_SELECT_TOKENS,
  SQL_UPDATE_TOKEN,
} from "./sql";

export interface TokenStoreOptions {
  logger?: Logger;
  /** Handed to every SecurID token loaded from the store */
  securid?: SecuridComputer;
}

/**
 * Column values of one row, rowid excepted
 */
interface TokenParams {
  type: TokenType;
  algo: string;
  counter: number | null;
  digits: number;
  issuer_int: string | null;
  issuer_ext: string | null;
  label: string | null;
  period: number;
  exp_date: string | null;
  pin: string | null;
  serial: string | null;
  secret: string;
}

interface TokenRow {
  rowid: number;
  type: string;
  algo: string | null;
  counter: number | null;
  digits: number | null;
  issuer_int: string | null;
  issuer_ext: string | null;
  label: string | null;
  period: number | null;
  exp_date: string | null;
  pin: string | null;
  serial: string | null;
  secret: string;
}

function tokenParams(token: Token): TokenParams {
  return {
    type: token.type,
    algo: token.algorithm,
    counter: token.counter,
    digits: token.digits,
    issuer_int: token.issuerInt,
    issuer_ext: token.issuerExt,
    label: token.label,
    period: token.period,
    exp_date: token.expDate,
    pin: token.pin,
    serial: token.serial,
    secret: token.secret.toBase32(),
  };
}

export class TokenStore implements TokenRemover {
  readonly filename: string;
  private readonly logger: Logger;
  private readonly securid?: SecuridComputer;

  constructor(filename: string, options: TokenStoreOptions = {}) {
    this.filename = filename;
    this.logger = options.logger ?? silentLogger;
    this.securid = options.securid;
  }

  /**
   * Open a store, creating its directory, file and table when missing
   */
  static open(filename: string, options: TokenStoreOptions = {}): TokenStore {
    const store = new TokenStore(filename, options);
    store.init();
    return store;
  }

  /**
   * Create the directory and the schema; safe to call repeatedly
   */
  init(): void {
    fs.mkdirSync(path.dirname(this.filename), { recursive: true });
    this.connect(() => undefined);
  }

  /**
   * All tokens in storage order, each bound to this store
   */
  list(): Token[] {
    const rows = this.connect((db) =>
      db.prepare<[], TokenRow>(SQL_SELECT_TOKENS).all(),
    );
    return rows.map((row) =>
      Token.fromRecord(row, {
        store: this,
        securid: this.securid,
        logger: this.logger,
      }),
    );
  }

  /**
   * Insert a token; sets its rowid and binds it to this store
   * @returns The new rowid
   */
  insert(token: Token): number {
    const rowid = this.connect((db) =>
      db.transaction(() =>
        Number(
          db
            .prepare<TokenParams>(SQL_INSERT_TOKEN)
            .run(tokenParams(token)).lastInsertRowid,
        ),
      )(),
    );
    token.rowid = rowid;
    token.store = this;
    this.logger.debug(`Token ${token} inserted as #${rowid}`);
    return rowid;
  }

  /**
   * Overwrite the row of a persisted token
   * @returns false when no row has the token's rowid
   * @throws NotFoundError when the token was never persisted
   */
  update(token: Token): boolean {
    const rowid = token.rowid;
    if (rowid === undefined) {
      throw new NotFoundError(`Token ${token} has no rowid`);
    }
    const changes = this.connect((db) =>
      db.transaction(
        () =>
          db
            .prepare<TokenParams & { rowid: number }>(SQL_UPDATE_TOKEN)
            .run({ ...tokenParams(token), rowid }).changes,
      )(),
    );
    if (changes === 0) {
      this.logger.warn(`Token #${rowid} not found, nothing updated`);
      return false;
    }
    this.logger.debug(`Token #${rowid} updated`);
    return true;
  }

  /**
   * Remove a row; a missing rowid is not an error
   * @returns whether a row was removed
   */
  delete(rowid: number): boolean {
    const changes = this.connect((db) =>
      db.transaction(
        () => db.prepare<[number]>(SQL_DELETE_TOKEN).run(rowid).changes,
      )(),
    );
    this.logger.debug(
      changes ? `Token #${rowid} deleted` : `Token #${rowid} already absent`,
    );
    return changes > 0;
  }

  /**
   * Drop and recreate the table
   */
  truncate(): void {
    this.connect((db) =>
      db.transaction(() => {
        db.exec(SQL_DROP_TOKENS_TABLE);
        db.exec(SQL_CREATE_TOKENS_TABLE);
      })(),
    );
    this.logger.debug("Token table truncated");
  }

  /**
   * Load tokens from a parsed backup document. Every record is checked
   * before anything is written; one bad record fails the whole import.
   * @param data Parsed backup JSON
   * @param deleteExisting Empty the store first
   * @returns Number of tokens imported
   * @throws BackupFormatError, InvalidTokenTypeError
   */
  importBackup(data: unknown, deleteExisting = false): number {
    const tokens = tokensFromBackup(data);
    this.connect((db) =>
      db.transaction(() => {
        if (deleteExisting) {
          db.exec(SQL_DROP_TOKENS_TABLE);
          db.exec(SQL_CREATE_TOKENS_TABLE);
        }
        const insert = db.prepare<TokenParams>(SQL_INSERT_TOKEN);
        for (const token of tokens) {
          insert.run(tokenParams(token));
        }
      })(),
    );
    this.logger.debug(`${tokens.length} tokens imported`);
    return tokens.length;
  }

  /**
   * Read a backup file and import it
   */
  importBackupFile(filename: string, deleteExisting = false): number {
    const content = fs.readFileSync(filename, "utf8");
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (e) {
      throw new BackupFormatError(`${filename} is not valid JSON`, undefined, {
        cause: e,
      });
    }
    return this.importBackup(data, deleteExisting);
  }

  /**
   * Backup document of every stored token
   */
  toBackup(): BackupFile {
    return buildBackup(this.list());
  }

  /**
   * Write every token to a backup file
   * @returns Number of tokens exported
   */
  exportBackup(filename: string): number {
    const backup = this.toBackup();
    fs.mkdirSync(path.dirname(filename), { recursive: true });
    fs.writeFileSync(filename, JSON.stringify(backup, null, 2), {
      mode: 0o600,
    });
    this.logger.debug(`${backup.tokens.length} tokens exported to ${filename}`);
    return backup.tokens.length;
  }

  private connect<T>(fn: (db: Database.Database) => T): T {
    const db = new Database(this.filename);
    try {
      db.exec(SQL_CREATE_TOKENS_TABLE);
      return fn(db);
    } finally {
      db.close();
    }
  }
}
