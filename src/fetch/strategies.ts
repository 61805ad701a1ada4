/**
 * Network fetch strategies.
 *
 * Paper hosts often gate downloads on the referer and user agent, so each
 * item is tried with up to three request identities, in order:
 *
 *   1. primary            undici, referer = the link itself, cookies
 *   2. search-referer     undici, referer = a search engine, cookies
 *   3. publisher-referer  axios, alternate user agent, referer = a publisher
 *
 * The last strategy deliberately uses a different HTTP client, whose
 * redirect handling and header ordering differ from undici's.
 *
 * A strategy never throws: every transport, status or filesystem problem is
 * returned as `{ ok: false, reason }`.
 */

import { Agent, request, type Dispatcher } from "undici";
import axios, { isAxiosError, type AxiosInstance } from "axios";
import http from "node:http";
import https from "node:https";
import { Readable } from "node:stream";
import type { FetchSettings } from "../config/index.js";
import type { StrategyName, WorkItem } from "../types/index.js";
import type { CookieJar } from "./cookies.js";
import { declaredLength, saveResponseBody } from "./transfer.js";

export const PDF_ACCEPT = "application/pdf";

export type StrategyResult = { ok: true; bytes: number } | { ok: false; reason: string };

export interface FetchStrategy {
  readonly name: StrategyName;
  /**
   * Try to place the artifact for item at destination.
   */
  attempt(item: WorkItem, destination: string): Promise<StrategyResult>;
}

/**
 * Settings the strategies read.
 */
export type StrategySettings = Pick<
  FetchSettings,
  | "userAgent"
  | "fallbackReferer"
  | "publisherReferer"
  | "fallbackUserAgent"
  | "requestTimeoutMs"
  | "maxRedirects"
  | "verifyPdf"
>;

/**
 * Short description of a failure for logs and the failure report.
 */
export function describeError(err: unknown): string {
  if (isAxiosError(err)) {
    if (err.response) {
      return `HTTP ${err.response.status}`;
    }
    return err.code ? `${err.code}: ${err.message}` : err.message;
  }
  if (err instanceof Error) {
    const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
    return code ? `${code}: ${err.message}` : err.message;
  }
  return String(err);
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Connection pool for the undici strategies. Redirects and timeouts are
 * configured here rather than per request.
 */
export function createPrimaryAgent(settings: StrategySettings): Agent {
  return new Agent({
    maxRedirections: settings.maxRedirects,
    headersTimeout: settings.requestTimeoutMs,
    bodyTimeout: settings.requestTimeoutMs,
  });
}

/**
 * Strategy on undici's request API.
 *
 * @param referer - Referer header for an item
 */
export function createUndiciStrategy(
  name: StrategyName,
  referer: (item: WorkItem) => string,
  settings: StrategySettings,
  cookies: CookieJar,
  dispatcher: Dispatcher
): FetchStrategy {
  return {
    name,
    async attempt(item, destination) {
      const headers: Record<string, string> = {
        "user-agent": settings.userAgent,
        accept: PDF_ACCEPT,
        referer: referer(item),
      };
      const cookie = cookies.headerFor(item.link);
      if (cookie !== undefined) {
        headers.cookie = cookie;
      }

      try {
        const response = await request(item.link, { method: "GET", headers, dispatcher });

        if (!isSuccessStatus(response.statusCode)) {
          await response.body.dump();
          return { ok: false, reason: `HTTP ${response.statusCode}` };
        }

        const bytes = await saveResponseBody(response.body, destination, {
          expectedLength: declaredLength(
            response.headers["content-length"],
            response.headers["content-encoding"]
          ),
          verifyPdf: settings.verifyPdf,
        });
        return { ok: true, bytes };
      } catch (err) {
        return { ok: false, reason: describeError(err) };
      }
    },
  };
}

/**
 * Create the axios client used by the publisher-referer strategy.
 */
export function createFallbackClient(settings: StrategySettings): AxiosInstance {
  return axios.create({
    timeout: settings.requestTimeoutMs,
    maxRedirects: settings.maxRedirects,
    responseType: "stream",
    validateStatus: isSuccessStatus,
    httpAgent: new http.Agent({ keepAlive: false }),
    httpsAgent: new https.Agent({ keepAlive: false }),
    headers: {
      "User-Agent": settings.fallbackUserAgent,
      Accept: PDF_ACCEPT,
      "Accept-Encoding": "identity",
    },
  });
}

/**
 * Strategy on axios.
 */
export function createAxiosStrategy(
  name: StrategyName,
  referer: (item: WorkItem) => string,
  settings: StrategySettings,
  client: AxiosInstance = createFallbackClient(settings)
): FetchStrategy {
  return {
    name,
    async attempt(item, destination) {
      try {
        const response = await client.get<Readable>(item.link, {
          headers: { Referer: referer(item) },
        });

        const bytes = await saveResponseBody(response.data, destination, {
          expectedLength: declaredLength(
            response.headers["content-length"],
            response.headers["content-encoding"]
          ),
          verifyPdf: settings.verifyPdf,
        });
        return { ok: true, bytes };
      } catch (err) {
        if (isAxiosError(err) && err.response?.data instanceof Readable) {
          err.response.data.destroy();
        }
        return { ok: false, reason: describeError(err) };
      }
    },
  };
}

/**
 * Strategies plus the resources they hold open.
 */
export interface StrategySet {
  readonly strategies: readonly FetchStrategy[];
  /** Release pooled connections once the run is over. */
  close(): Promise<void>;
}

/**
 * The standard three-step chain.
 */
export function createDefaultStrategies(
  settings: StrategySettings,
  cookies: CookieJar
): StrategySet {
  const agent = createPrimaryAgent(settings);
  return {
    strategies: [
      createUndiciStrategy("primary", (item) => item.link, settings, cookies, agent),
      createUndiciStrategy("search-referer", () => settings.fallbackReferer, settings, cookies, agent),
      createAxiosStrategy("publisher-referer", () => settings.publisherReferer, settings),
    ],
    close: () => agent.close(),
  };
}
