/**
 * Fetch settings: schema, defaults and validation.
 */

export type { FetchSettings } from "./schema.js";
export { FetchSettingsSchema } from "./schema.js";

export {
  loadFetchSettings,
  FetchSettingsError,
  type SettingsIssue,
} from "./loader.js";

export {
  DEFAULT_FETCH_SETTINGS,
  DEFAULT_USER_AGENT,
  DEFAULT_FALLBACK_USER_AGENT,
} from "./defaults.js";
