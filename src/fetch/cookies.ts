/**
 * Cookie store for authenticated publisher sessions.
 *
 * Reads the Netscape cookies.txt format that browsers' export extensions and
 * curl write: one cookie per line, seven tab-separated fields
 *
 *   domain  includeSubdomains  path  secure  expires  name  value
 *
 * Lines starting with `#` are comments, except the `#HttpOnly_` prefix which
 * marks an HttpOnly cookie and is part of the domain field.
 */

import { readFile } from "node:fs/promises";

const HTTP_ONLY_PREFIX = "#HttpOnly_";

export interface StoredCookie {
  /** Lower-cased, without leading dot */
  domain: string;
  includeSubdomains: boolean;
  path: string;
  secure: boolean;
  /** Unix seconds; 0 for a session cookie */
  expires: number;
  name: string;
  value: string;
}

function parseFlag(field: string): boolean {
  return field.toUpperCase() === "TRUE";
}

/**
 * Parse cookies.txt content. Malformed lines are ignored.
 */
export function parseCookieFile(text: string): StoredCookie[] {
  const cookies: StoredCookie[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    let line = rawLine;
    if (line.startsWith(HTTP_ONLY_PREFIX)) {
      line = line.slice(HTTP_ONLY_PREFIX.length);
    } else if (line.startsWith("#") || line.trim() === "") {
      continue;
    }

    const fields = line.split("\t");
    if (fields.length < 6) continue;

    const [domain = "", subdomains = "", path = "", secure = "", expires = "", name = "", value = ""] =
      fields;
    const expiresAt = Number(expires);
    if (domain === "" || name === "" || !Number.isFinite(expiresAt)) continue;

    cookies.push({
      domain: domain.replace(/^\./, "").toLowerCase(),
      includeSubdomains: parseFlag(subdomains),
      path: path === "" ? "/" : path,
      secure: parseFlag(secure),
      expires: expiresAt,
      name,
      value,
    });
  }

  return cookies;
}

function domainMatches(cookie: StoredCookie, host: string): boolean {
  if (host === cookie.domain) return true;
  return cookie.includeSubdomains && host.endsWith(`.${cookie.domain}`);
}

function pathMatches(cookiePath: string, requestPath: string): boolean {
  if (requestPath === cookiePath) return true;
  if (!requestPath.startsWith(cookiePath)) return false;
  return cookiePath.endsWith("/") || requestPath.charAt(cookiePath.length) === "/";
}

/**
 * Read-only set of cookies selected per request URL.
 */
export class CookieJar {
  private readonly cookies: readonly StoredCookie[];

  constructor(cookies: readonly StoredCookie[]) {
    this.cookies = cookies;
  }

  static empty(): CookieJar {
    return new CookieJar([]);
  }

  static fromText(text: string): CookieJar {
    return new CookieJar(parseCookieFile(text));
  }

  static async fromFile(path: string): Promise<CookieJar> {
    return CookieJar.fromText(await readFile(path, "utf-8"));
  }

  get size(): number {
    return this.cookies.length;
  }

  /**
   * Value for a `Cookie` request header, or undefined when nothing applies.
   *
   * @param now - Current time in milliseconds
   */
  headerFor(url: string, now: number = Date.now()): string | undefined {
    let target: URL;
    try {
      target = new URL(url);
    } catch {
      return undefined;
    }

    const host = target.hostname.toLowerCase();
    const isHttps = target.protocol === "https:";
    const nowSeconds = Math.floor(now / 1000);

    const pairs = this.cookies
      .filter(
        (cookie) =>
          domainMatches(cookie, host) &&
          pathMatches(cookie.path, target.pathname) &&
          (!cookie.secure || isHttps) &&
          (cookie.expires === 0 || cookie.expires > nowSeconds)
      )
      .map((cookie) => `${cookie.name}=${cookie.value}`);

    return pairs.length > 0 ? pairs.join("; ") : undefined;
  }
}
