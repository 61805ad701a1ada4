/**
 * Fetching one work item: strategies, the chain that drives them, and the
 * cookie store they share.
 */

export { ArtifactFetcher, type ArtifactFetcherOptions, type ItemFetcher } from "./chain.js";
export {
  createAxiosStrategy,
  createDefaultStrategies,
  createFallbackClient,
  createPrimaryAgent,
  createUndiciStrategy,
  describeError,
  PDF_ACCEPT,
  type FetchStrategy,
  type StrategyResult,
  type StrategySet,
  type StrategySettings,
} from "./strategies.js";
export { CookieJar, parseCookieFile, type StoredCookie } from "./cookies.js";
export { declaredLength, saveResponseBody, TransferError, type TransferOptions } from "./transfer.js";
