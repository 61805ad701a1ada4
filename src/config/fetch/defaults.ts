/**
 * Default fetch settings.
 *
 * The header values mimic a desktop Firefox arriving from the paper's own
 * page, then from a search engine, then from a publisher site.
 */

import type { FetchSettings } from "./schema.js";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; rv:112.0) Gecko/20100101 Firefox/112.0";

export const DEFAULT_FALLBACK_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:112.0) Gecko/20100101 Firefox/112.0";

export const DEFAULT_FETCH_SETTINGS: FetchSettings = {
  storeRoot: "papers",
  concurrency: 6,
  cookieFile: "cookies.txt",
  userAgent: DEFAULT_USER_AGENT,
  fallbackReferer: "https://www.google.com",
  publisherReferer: "https://dl.acm.org/",
  fallbackUserAgent: DEFAULT_FALLBACK_USER_AGENT,
  requestTimeoutMs: 300_000,
  maxRedirects: 10,
  verifyPdf: false,
};
