/**
 * @otpkeep/conf - Display preferences
 *
 * Flat INI file, read once at startup and rewritten in place:
 *
 * ```ini
 * copy_to_clipboard=true
 * show_codes=false
 * show_time_left=false
 * spinner_style=◯◔◒◕●
 * ```
 *
 * @packageDocumentation
 */

import fs from "fs";
import ini from "ini";
import os from "os";
import path from "path";
import type { Logger } from "@otpkeep/types";

export const APP_NAME = "otpkeep";
export const CONFIG_FILENAME = "config.ini";
export const DB_FILENAME = "otpkeep.db";

export interface Settings {
  copyToClipboard: boolean;
  showCodes: boolean;
  showTimeLeft: boolean;
  /** Spinner glyphs from empty to full, "" for none */
  spinnerStyle: string;
}

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  copyToClipboard: true,
  showCodes: false,
  showTimeLeft: false,
  spinnerStyle: "",
};

const INI_KEYS: { [K in keyof Settings]: string } = {
  copyToClipboard: "copy_to_clipboard",
  showCodes: "show_codes",
  showTimeLeft: "show_time_left",
  spinnerStyle: "spinner_style",
};

export interface DefaultPaths {
  configDir: string;
  dbPath: string;
  configPath: string;
}

/**
 * Where configuration and tokens live unless told otherwise
 * @param env Environment, `OTPKEEP_CONFIG_DIR`, `XDG_CONFIG_HOME` and
 * `OTPKEEP_DB` are honoured
 */
export function defaultPaths(
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir(),
): DefaultPaths {
  const configDir =
    env.OTPKEEP_CONFIG_DIR ||
    (env.XDG_CONFIG_HOME
      ? path.join(env.XDG_CONFIG_HOME, APP_NAME)
      : path.join(home, ".config", APP_NAME));
  return {
    configDir,
    dbPath: env.OTPKEEP_DB || path.join(configDir, DB_FILENAME),
    configPath: path.join(configDir, CONFIG_FILENAME),
  };
}

function readIni(file: string): Record<string, unknown> {
  if (!fs.existsSync(file)) return {};
  return ini.parse(fs.readFileSync(file, "utf-8"));
}

export class Config implements Settings {
  readonly path: string;
  copyToClipboard: boolean;
  showCodes: boolean;
  showTimeLeft: boolean;
  spinnerStyle: string;

  constructor(file: string, settings: Partial<Settings> = {}) {
    this.path = file;
    this.copyToClipboard =
      settings.copyToClipboard ?? DEFAULT_SETTINGS.copyToClipboard;
    this.showCodes = settings.showCodes ?? DEFAULT_SETTINGS.showCodes;
    this.showTimeLeft = settings.showTimeLeft ?? DEFAULT_SETTINGS.showTimeLeft;
    this.spinnerStyle = settings.spinnerStyle ?? DEFAULT_SETTINGS.spinnerStyle;
  }

  /**
   * Read a config file; a missing file gives the defaults
   * @param logger Told about values that are ignored
   */
  static load(file: string, logger?: Logger): Config {
    const data = readIni(file);
    const config = new Config(file);

    const flag = (key: keyof Settings, fallback: boolean): boolean => {
      const value = data[INI_KEYS[key]];
      if (value === undefined) return fallback;
      if (typeof value === "boolean") return value;
      logger?.warn(`${file}: ${INI_KEYS[key]} must be true or false`);
      return fallback;
    };

    config.copyToClipboard = flag("copyToClipboard", config.copyToClipboard);
    config.showCodes = flag("showCodes", config.showCodes);
    config.showTimeLeft = flag("showTimeLeft", config.showTimeLeft);

    const spinner = data[INI_KEYS.spinnerStyle];
    if (typeof spinner === "string") {
      config.spinnerStyle = spinner;
    } else if (spinner !== undefined) {
      logger?.warn(`${file}: spinner_style must be a string`);
    }
    return config;
  }

  /**
   * Write the settings, keeping unrelated keys of an existing file
   */
  save(): void {
    const data = readIni(this.path);
    data[INI_KEYS.copyToClipboard] = this.copyToClipboard;
    data[INI_KEYS.showCodes] = this.showCodes;
    data[INI_KEYS.showTimeLeft] = this.showTimeLeft;
    data[INI_KEYS.spinnerStyle] = this.spinnerStyle;
    fs.mkdirSync(path.dirname(this.path), { recursive: true });
    fs.writeFileSync(this.path, ini.stringify(data));
  }

  toSettings(): Settings {
    return {
      copyToClipboard: this.copyToClipboard,
      showCodes: this.showCodes,
      showTimeLeft: this.showTimeLeft,
      spinnerStyle: this.spinnerStyle,
    };
  }

  toString(): string {
    return (
      `path: (${this.path}) copy_to_clipboard: ${this.copyToClipboard}` +
      ` show_codes: ${this.showCodes} show_time_left: ${this.showTimeLeft}` +
      ` spinner_style: ${this.spinnerStyle}`
    );
  }
}

export default Config;
