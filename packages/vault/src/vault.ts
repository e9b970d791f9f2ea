/**
 * @otpkeep/vault - Vault
 *
 * Everything a front end needs from the token collection: lookup, display
 * lines, codes, edition and backups. Holds the display preferences and the
 * per-invocation counter/timestamp overrides.
 *
 * @packageDocumentation
 */

import { Config } from "@otpkeep/conf";
import type { Settings } from "@otpkeep/conf";
import { createLogger } from "@otpkeep/logger";
import {
  NotFoundError,
  OTPAUTH_SCHEME,
  Secret,
  Token,
  parseAlgorithm,
  parseCounter,
  parsePositiveInt,
  parseTokenType,
} from "@otpkeep/otp";
import type {
  SecuridComputer,
  Timestamp,
  TokenFields,
  TokenOptions,
} from "@otpkeep/otp";
import { TokenStore } from "@otpkeep/store";
import type { Logger } from "@otpkeep/types";

/**
 * Built-in spinner glyph sets, "" meaning no spinner
 */
export const SPINNER_STYLES: readonly string[] = [
  "",
  "◯◔◒◕●",
  " ▁▂▃▄▅▆▇█",
  " ▏▎▍▌▋▊▉",
];

export interface VaultOptions {
  dbPath: string;
  configPath: string;
  /** Log at debug level with the default logger */
  verbose?: boolean;
  /** HOTP counter used instead of the stored one */
  counter?: number;
  /** TOTP time used instead of now */
  timestamp?: Timestamp;
  /** Overrides the configured value */
  copyToClipboard?: boolean;
  /** Overrides the configured value */
  showCodes?: boolean;
  logger?: Logger;
  securid?: SecuridComputer;
}

/**
 * A token, or a string matched against identities; `otpauth://` strings
 * are parsed as transient tokens
 */
export type TokenQuery = string | Token;

/**
 * Fields of a token to add. Type and algorithm are parsed from their
 * names, the secret may be Base32.
 */
export type NewTokenFields = Omit<
  TokenFields,
  "rowid" | "type" | "algorithm" | "secret"
> & {
  type?: string;
  algorithm?: string;
  secret: string | Secret;
};

export interface TokenChanges {
  type?: string;
  algorithm?: string;
  counter?: number | null;
  digits?: number;
  issuer?: string | null;
  label?: string | null;
  period?: number;
  secret?: string | Secret;
}

export interface ListOptions {
  /** Prepend the current code */
  calculate?: boolean;
  /** Add rowid, type, algorithm, digits and period columns */
  longFormat?: boolean;
  /** Restrict to the tokens these queries match; empty lists everything */
  tokens?: TokenQuery | readonly TokenQuery[];
}

function toSecret(secret: string | Secret): Secret {
  return typeof secret === "string" ? Secret.fromBase32(secret) : secret;
}

function isEmptyQuery(args: TokenQuery | readonly TokenQuery[]): boolean {
  if (typeof args === "string") return args === "";
  return !(args instanceof Token) && args.length === 0;
}

export class Vault {
  readonly config: Config;
  readonly store: TokenStore;
  readonly logger: Logger;
  readonly verbose: boolean;
  counter?: number;
  timestamp?: Timestamp;
  private readonly securid?: SecuridComputer;

  constructor(options: VaultOptions) {
    this.verbose = options.verbose ?? false;
    this.logger =
      options.logger ??
      createLogger({ logLevel: this.verbose ? "debug" : "notice" }, true);
    this.securid = options.securid;
    this.counter = options.counter;
    this.timestamp = options.timestamp;

    this.config = Config.load(options.configPath, this.logger);
    if (options.copyToClipboard !== undefined) {
      this.config.copyToClipboard = options.copyToClipboard;
    }
    if (options.showCodes !== undefined) {
      this.config.showCodes = options.showCodes;
    }

    this.store = TokenStore.open(options.dbPath, {
      logger: this.logger,
      securid: this.securid,
    });
    this.logger.debug(`Vault opened: ${options.dbPath}, ${this.config}`);
  }

  tokens(): Token[] {
    return this.store.list();
  }

  /**
   * Token at a 1-based position of the list
   * @throws NotFoundError
   */
  getToken(index: number): Token {
    const tokens = this.tokens();
    if (!Number.isInteger(index) || index < 1 || index > tokens.length) {
      throw new NotFoundError(`No token #${index}`);
    }
    return tokens[index - 1];
  }

  /**
   * Resolve queries to tokens: given tokens first, then the ones parsed
   * from URIs, then stored tokens whose identity contains any of the
   * strings (case-insensitive), each stored token once
   */
  find(args: TokenQuery | readonly TokenQuery[]): Token[] {
    const queries: readonly TokenQuery[] =
      typeof args === "string" || args instanceof Token ? [args] : args;

    const result: Token[] = queries.filter(
      (query): query is Token => query instanceof Token,
    );
    const strings = queries.filter(
      (query): query is string => typeof query === "string",
    );
    const uris = strings.filter((query) => this.isUri(query));
    const needles = strings
      .filter((query) => !this.isUri(query))
      .map((query) => query.toLowerCase());

    for (const uri of uris) {
      result.push(Token.fromURI(uri, this.tokenOptions()));
    }
    if (needles.length === 0) return result;

    for (const token of this.tokens()) {
      const identity = token.toString().toLowerCase().trim();
      if (needles.some((needle) => identity.includes(needle))) {
        result.push(token);
      }
    }
    return result;
  }

  /**
   * Current code of a token, with this vault's counter/timestamp overrides
   */
  code(token: Token): string {
    return token.calculate(this.timestamp, this.counter);
  }

  /**
   * Menu line of a token
   */
  formatToken(token: Token): string {
    const parts = [`${String(token.rowid ?? "").padStart(2)}:`];
    if (this.config.showCodes) {
      parts.push(this.code(token).padStart(8));
    }
    if (this.config.spinnerStyle) {
      parts.push(
        token.spinner(this.config.spinnerStyle, this.timestamp).padEnd(1),
      );
    }
    if (this.config.showTimeLeft) {
      const left = token.timeLeft(this.timestamp);
      parts.push(`[${(left ? String(left) : "--").padStart(2)}]`);
    }
    parts.push(` ${token}`);
    return parts.join(" ");
  }

  /**
   * Lines of the token listing
   */
  listLines(options: ListOptions = {}): string[] {
    const tokens =
      options.tokens === undefined || isEmptyQuery(options.tokens)
        ? this.tokens()
        : this.find(options.tokens);

    return tokens.map((token) => {
      const columns = options.longFormat
        ? [
            String(token.rowid ?? "").padStart(4),
            token.type.padEnd(7),
            token.algorithm.padEnd(6),
            String(token.digits).padStart(2),
            String(token.period).padStart(3),
            token.toString(),
          ]
        : [token.toString()];
      if (!options.calculate) {
        return columns.join(" ");
      }

      const code = this.code(token);
      columns.unshift(options.longFormat ? code.padEnd(8) : code);
      if (token.type === "HOTP" && token.counter) {
        columns.push(`(${token.counter})`);
      }
      return columns.join(" ");
    });
  }

  /**
   * Add a token from an otpauth:// URI or from explicit fields
   * @returns The stored token
   * @throws FormatError, InvalidTokenTypeError
   */
  addToken(input: string | NewTokenFields): Token {
    const token =
      typeof input === "string"
        ? Token.fromURI(input, this.tokenOptions())
        : new Token(
            {
              ...input,
              type: input.type ? parseTokenType(input.type) : undefined,
              algorithm: input.algorithm
                ? parseAlgorithm(input.algorithm)
                : undefined,
              secret: toSecret(input.secret),
            },
            this.tokenOptions(),
          );
    this.store.insert(token);
    this.logger.notice(`Token added: ${token}`);
    return token;
  }

  /**
   * Apply changes to a stored token
   * @throws NotFoundError when the token is no longer stored
   * @throws FormatError, InvalidTokenTypeError
   */
  editToken(token: Token, changes: TokenChanges): Token {
    if (changes.secret !== undefined) token.secret = toSecret(changes.secret);
    if (changes.issuer !== undefined) token.setIssuer(changes.issuer);
    if (changes.label !== undefined) token.label = changes.label;
    if (changes.type !== undefined) token.type = parseTokenType(changes.type);
    if (changes.algorithm !== undefined) {
      token.algorithm = parseAlgorithm(changes.algorithm);
    }
    if (changes.counter !== undefined) {
      token.counter =
        changes.counter === null ? null : parseCounter(changes.counter);
    }
    if (changes.digits !== undefined) {
      token.digits = parsePositiveInt("digits", changes.digits);
    }
    if (changes.period !== undefined) {
      token.period = parsePositiveInt("period", changes.period);
    }
    if (token.type === "HOTP" && token.counter === null) {
      token.counter = 0;
    }

    if (!this.store.update(token)) {
      throw new NotFoundError(`Token ${token} is not stored`);
    }
    this.logger.notice(`Token updated: ${token}`);
    return token;
  }

  /**
   * Delete the tokens matching the queries
   * @param confirm Asked for each token, all are deleted when omitted
   * @returns Number of tokens deleted
   */
  deleteTokens(
    args: TokenQuery | readonly TokenQuery[],
    confirm?: (token: Token) => boolean,
  ): number {
    let count = 0;
    for (const token of this.find(args)) {
      this.logger.info(token.details());
      if (confirm && !confirm(token)) continue;
      if (token.delete()) count++;
    }
    this.logger.notice(
      count === 1 ? "Token deleted" : `${count} tokens deleted`,
    );
    return count;
  }

  /**
   * Import a backup file
   * @returns Number of tokens imported
   */
  importBackup(filename: string, deleteExisting = false): number {
    const count = this.store.importBackupFile(filename, deleteExisting);
    this.logger.notice(`${count} tokens imported from ${filename}`);
    return count;
  }

  /**
   * Export every token to a backup file
   * @returns Number of tokens exported
   */
  exportBackup(filename: string): number {
    const count = this.store.exportBackup(filename);
    this.logger.notice(`${count} tokens exported to ${filename}`);
    return count;
  }

  /**
   * Change and persist display preferences
   */
  saveSettings(changes: Partial<Settings>): Settings {
    if (changes.copyToClipboard !== undefined) {
      this.config.copyToClipboard = changes.copyToClipboard;
    }
    if (changes.showCodes !== undefined) {
      this.config.showCodes = changes.showCodes;
    }
    if (changes.showTimeLeft !== undefined) {
      this.config.showTimeLeft = changes.showTimeLeft;
    }
    if (changes.spinnerStyle !== undefined) {
      this.config.spinnerStyle = changes.spinnerStyle;
    }
    this.config.save();
    this.logger.debug(`Settings saved: ${this.config}`);
    return this.config.toSettings();
  }

  private isUri(query: string): boolean {
    return query.startsWith(`${OTPAUTH_SCHEME}//`);
  }

  private tokenOptions(): TokenOptions {
    return { securid: this.securid, logger: this.logger };
  }
}
