/**
 * Environment Configuration
 *
 * Centralized access to environment variables with type safety.
 */

import os from "os";
import path from "path";

/**
 * Logging configuration.
 * LOG_LEVEL=debug|info|warn|error sets the minimum level (default: warn).
 * LOG_FORMAT=json switches to one JSON object per line.
 */
export const logConfig = {
  level: process.env.LOG_LEVEL,
  json: process.env.LOG_FORMAT === "json",
};

/**
 * File locations.
 * Both can be overridden per invocation with --data and --config.
 */
export const pathConfig = {
  /** Feed database (registry + seen entries). */
  dataFile:
    process.env.FEEDMAIL_DATA ??
    path.join(
      process.env.XDG_DATA_HOME ?? path.join(os.homedir(), ".local", "share"),
      "feedmail",
      "feeds.json"
    ),

  /** Options file. A missing file means built-in defaults. */
  configFile:
    process.env.FEEDMAIL_CONFIG ??
    path.join(
      process.env.XDG_CONFIG_HOME ?? path.join(os.homedir(), ".config"),
      "feedmail",
      "config.json"
    ),
};

/**
 * Secrets that should not live in the options file.
 */
export const secretsConfig = {
  /** Overrides smtp.password from the options file when set. */
  smtpPassword: process.env.FEEDMAIL_SMTP_PASSWORD,
};
