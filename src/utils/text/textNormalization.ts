/**
 * Text normalization helpers shared by coverage and verification
 *
 * Deliberately minimal: lowercase + whitespace split, no stemming and no
 * punctuation stripping, so "python," and "python" are different words.
 * Keyword overlap in the analyzer and verifier depends on this.
 */

const WHITESPACE_PATTERN = /\s+/;

/**
 * Lowercase and split on whitespace, dropping empty strings
 */
export function lowercaseWords(text: string): string[] {
  return text
    .toLowerCase()
    .split(WHITESPACE_PATTERN)
    .filter((w) => w.length > 0);
}

/**
 * Alphanumeric tokens (lowercased), used by the mock embedder
 *
 * @example
 * alphanumericTokens("Led Python team, 6 years") // ["led", "python", "team", "6", "years"]
 */
export function alphanumericTokens(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9+#]+/)
    .filter((t) => t.length > 0);
}

/**
 * Escape a literal for use inside a RegExp
 */
export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
