/**
 * Feed fetching.
 * Handles conditional GET requests, redirects, timeouts and local feed files.
 */

import { readFile } from "fs/promises";
import { fileURLToPath } from "url";
import { buildUserAgent } from "../http/user-agent";

/**
 * Options for fetching a feed.
 */
export interface FetchFeedOptions {
  /** ETag from previous response for conditional GET */
  etag?: string;
  /** Last-Modified value from previous response for conditional GET */
  lastModified?: string;
  /** Request timeout in milliseconds (default: 60000) */
  timeout?: number;
  /** User-Agent header to send (overrides default) */
  userAgent?: string;
  /** Maximum number of redirects to follow (default: 5) */
  maxRedirects?: number;
  /** Maximum body size in bytes (default: 10MB) */
  maxBytes?: number;
}

/**
 * Redirect information from an HTTP response.
 */
export interface RedirectInfo {
  /** The URL we were redirected to */
  url: string;
  /** Type of redirect */
  type: "permanent" | "temporary";
}

/**
 * Result of a successful feed fetch.
 */
export interface FetchSuccessResult {
  status: "success";
  /** Response body decoded as UTF-8 */
  body: string;
  /** Content-Type header value */
  contentType: string;
  /** Final URL after redirects */
  finalUrl: string;
  /** URL to store for future fetches when every hop was a permanent redirect */
  permanentUrl?: string;
  /** ETag for the next conditional GET */
  etag?: string;
  /** Last-Modified for the next conditional GET */
  lastModified?: string;
  /** Redirect chain, if any */
  redirects: RedirectInfo[];
}

/**
 * Result of a 304 Not Modified response.
 */
export interface FetchNotModifiedResult {
  status: "not_modified";
  /** URL to store for future fetches when every hop was a permanent redirect */
  permanentUrl?: string;
  redirects: RedirectInfo[];
}

/**
 * Result of an HTTP error status.
 */
export interface FetchHttpErrorResult {
  status: "http_error";
  statusCode: number;
  message: string;
  /** Whether the error is permanent (404, 410) */
  permanent: boolean;
}

/**
 * Result of a network, timeout, size or redirect-loop failure.
 */
export interface FetchNetworkErrorResult {
  status: "network_error";
  message: string;
  /** Whether this was a timeout */
  timeout: boolean;
}

/**
 * All possible fetch results.
 */
export type FetchFeedResult =
  | FetchSuccessResult
  | FetchNotModifiedResult
  | FetchHttpErrorResult
  | FetchNetworkErrorResult;

/** Default request timeout in milliseconds */
const DEFAULT_TIMEOUT_MS = 60_000;

/** Default maximum redirects to follow */
const DEFAULT_MAX_REDIRECTS = 5;

/** Default maximum feed size */
const DEFAULT_MAX_BYTES = 10 * 1024 * 1024;

/**
 * Translates technical Node.js network error messages into user-friendly descriptions.
 */
export function formatNetworkErrorMessage(error: Error): string {
  const message = error.message;
  const cause = error.cause instanceof Error ? error.cause : undefined;
  const code =
    (error as NodeJS.ErrnoException).code ?? (cause as NodeJS.ErrnoException | undefined)?.code;
  const detail = cause ? `${message} ${cause.message}` : message;

  if (code === "ENOTFOUND" || detail.includes("ENOTFOUND")) {
    const domain = detail.match(/ENOTFOUND\s+(\S+)/)?.[1];
    return domain ? `Domain not found: ${domain}` : "Domain not found (DNS lookup failed)";
  }
  if (code === "EAI_AGAIN" || detail.includes("EAI_AGAIN")) {
    return "DNS lookup timed out (temporary DNS failure)";
  }
  if (code === "ECONNREFUSED" || detail.includes("ECONNREFUSED")) {
    return "Connection refused (server not accepting connections)";
  }
  if (code === "ETIMEDOUT" || detail.includes("ETIMEDOUT")) {
    return "Connection timed out";
  }
  if (code === "ECONNRESET" || detail.includes("ECONNRESET")) {
    return "Connection reset by server";
  }
  if (code === "EHOSTUNREACH" || code === "ENETUNREACH") {
    return "Host unreachable";
  }
  if (code === "CERT_HAS_EXPIRED" || detail.includes("certificate has expired")) {
    return "SSL certificate has expired";
  }
  if (detail.includes("certificate") || detail.includes("SSL") || detail.includes("TLS")) {
    return `SSL/TLS error: ${cause?.message ?? message}`;
  }
  if (detail.includes("socket hang up")) {
    return "Connection closed unexpectedly";
  }

  return cause ? `${message}: ${cause.message}` : message;
}

/**
 * Checks if a status code is a redirect.
 */
function isRedirect(statusCode: number): boolean {
  return statusCode >= 300 && statusCode < 400 && statusCode !== 304;
}

/**
 * Reads a local feed file referenced by a file: URL.
 */
async function fetchFileFeed(url: string): Promise<FetchFeedResult> {
  try {
    const body = await readFile(fileURLToPath(url), "utf8");
    return {
      status: "success",
      body,
      contentType: "application/xml",
      finalUrl: url,
      redirects: [],
    };
  } catch (error) {
    return {
      status: "network_error",
      message: error instanceof Error ? error.message : "Unknown file error",
      timeout: false,
    };
  }
}

/**
 * Reads the response body, giving up once it exceeds maxBytes.
 */
async function readBody(response: Response, maxBytes: number): Promise<string | null> {
  const declared = parseInt(response.headers.get("content-length") ?? "", 10);
  if (!isNaN(declared) && declared > maxBytes) {
    return null;
  }
  if (!response.body) {
    return "";
  }

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let received = 0;

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    received += value.byteLength;
    if (received > maxBytes) {
      await reader.cancel();
      return null;
    }
    chunks.push(value);
  }

  return Buffer.concat(chunks, received).toString("utf8");
}

/**
 * Fetches a feed from the given URL.
 *
 * Supports:
 * - Conditional GET with If-None-Match (ETag) and If-Modified-Since
 * - Redirects, reporting a new permanent URL when every hop was permanent
 * - Timeout handling covering the whole exchange, body included
 * - file: URLs for feeds on the local disk
 *
 * @example
 * const result = await fetchFeed("https://example.com/feed.xml", {
 *   etag: '"abc123"',
 *   timeout: 30_000,
 * });
 */
export async function fetchFeed(
  url: string,
  options: FetchFeedOptions = {}
): Promise<FetchFeedResult> {
  const {
    etag,
    lastModified,
    timeout = DEFAULT_TIMEOUT_MS,
    userAgent,
    maxRedirects = DEFAULT_MAX_REDIRECTS,
    maxBytes = DEFAULT_MAX_BYTES,
  } = options;

  if (url.startsWith("file:")) {
    return fetchFileFeed(url);
  }

  const headers: Record<string, string> = {
    "User-Agent": userAgent ?? buildUserAgent(),
    Accept:
      "application/rss+xml, application/atom+xml, application/feed+json, application/xml, text/xml, */*",
  };
  if (etag) {
    headers["If-None-Match"] = etag;
  }
  if (lastModified) {
    headers["If-Modified-Since"] = lastModified;
  }

  const redirects: RedirectInfo[] = [];
  let currentUrl = url;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  // Only a chain made entirely of permanent redirects moves the feed
  const permanentUrl = () =>
    redirects.length > 0 && redirects.every((redirect) => redirect.type === "permanent")
      ? currentUrl
      : undefined;

  try {
    for (let redirectCount = 0; redirectCount <= maxRedirects; redirectCount++) {
      const response = await fetch(currentUrl, {
        method: "GET",
        headers,
        signal: controller.signal,
        redirect: "manual",
      });

      if (isRedirect(response.status)) {
        const location = response.headers.get("location");
        if (!location) {
          return {
            status: "http_error",
            statusCode: response.status,
            message: "Redirect without Location header",
            permanent: false,
          };
        }

        const redirectUrl = new URL(location, currentUrl).toString();
        redirects.push({
          url: redirectUrl,
          type: response.status === 301 || response.status === 308 ? "permanent" : "temporary",
        });
        currentUrl = redirectUrl;
        continue;
      }

      if (response.status === 304) {
        return { status: "not_modified", permanentUrl: permanentUrl(), redirects };
      }

      if (response.status === 200 || response.status === 206) {
        const body = await readBody(response, maxBytes);
        if (body === null) {
          return {
            status: "network_error",
            message: `Response body exceeds maximum size of ${Math.round(maxBytes / (1024 * 1024))}MB`,
            timeout: false,
          };
        }

        return {
          status: "success",
          body,
          contentType: response.headers.get("content-type") ?? "application/xml",
          finalUrl: currentUrl,
          permanentUrl: permanentUrl(),
          etag: response.headers.get("etag") ?? undefined,
          lastModified: response.headers.get("last-modified") ?? undefined,
          redirects,
        };
      }

      return {
        status: "http_error",
        statusCode: response.status,
        message: `HTTP ${response.status}: ${response.statusText || "Error"}`,
        permanent: response.status === 404 || response.status === 410,
      };
    }

    return {
      status: "network_error",
      message: `Too many redirects (more than ${maxRedirects})`,
      timeout: false,
    };
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      return {
        status: "network_error",
        message: `Request timed out after ${timeout}ms`,
        timeout: true,
      };
    }

    return {
      status: "network_error",
      message: error instanceof Error ? formatNetworkErrorMessage(error) : "Unknown network error",
      timeout: false,
    };
  } finally {
    clearTimeout(timeoutId);
  }
}
