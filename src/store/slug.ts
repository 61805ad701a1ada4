/**
 * Filesystem-safe tokens for topic directories and artifact file names.
 */

const JOIN_CHAR = "_";

/**
 * Map arbitrary text to a path-safe token.
 *
 * Spaces, `/` and `:` become `_`; every other character that is not an ASCII
 * letter, digit or `_` is dropped. Total: text that strips to nothing yields "".
 *
 * @example
 *   slug("Attention Is All You Need") // "Attention_Is_All_You_Need"
 *   slug("RAG: a survey / 2024")     // "RAG__a_survey___2024"
 */
export function slug(text: string): string {
  return text.replace(/[ /:]/g, JOIN_CHAR).replace(/[^A-Za-z0-9_]/g, "");
}
