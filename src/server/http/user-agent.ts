/**
 * User-Agent header utilities.
 *
 * Format: feedmail/VERSION [context] (+Node.js/NODE_VERSION)
 */

/**
 * App name and version.
 */
export const APP_NAME_VERSION = "feedmail/0.1.0";

/**
 * Options for building a User-Agent string.
 */
export interface UserAgentOptions {
  /**
   * Optional context to include in the User-Agent, e.g. "feed:example".
   */
  context?: string;
}

/**
 * Builds the User-Agent string sent with feed requests and written to the
 * User-Agent header of outgoing mail.
 *
 * @example
 * buildUserAgent({ context: "feed:example" })
 * // => "feedmail/0.1.0 feed:example (+Node.js/20.11.0)"
 */
export function buildUserAgent(options?: UserAgentOptions): string {
  let ua = APP_NAME_VERSION;
  if (options?.context) {
    ua += ` ${options.context}`;
  }
  return `${ua} (+Node.js/${process.versions.node})`;
}
