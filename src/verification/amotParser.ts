/**
 * AMOT parser
 *
 * Splits a bullet into Action / Metric / Outcome / Tool by pattern
 * matching. Pure and total: missing parts become "[... not found]"
 * placeholders, nothing throws.
 */

import type { AMOTComponents } from "@/types";
import {
  METRIC_NOT_FOUND,
  METRIC_PATTERNS,
  OUTCOME_NOT_FOUND,
  OUTCOME_PATTERNS,
  TOOL_NOT_FOUND,
  TOOL_PATTERNS,
} from "@/constants";

const PLACEHOLDER_PATTERN = /^\[[a-z ]+ not found\]$/;

/**
 * First match of the first pattern that matches anywhere in the text
 */
function firstMatch(text: string, patterns: readonly RegExp[], fallback: string): string {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) {
      return match[0].trim();
    }
  }
  return fallback;
}

/**
 * Parse a bullet into its AMOT components.
 *
 * @example
 * parseAmot("Reduced latency 40% using Redis")
 * // { action: "Reduced", metric: "40%", outcome: "[outcome not found]",
 * //   tool: "using Redis", full_text: "Reduced latency 40% using Redis" }
 */
export function parseAmot(text: string): AMOTComponents {
  const trimmed = text.trim();
  const [action = ""] = trimmed.split(/\s+/);

  return {
    action,
    metric: firstMatch(text, METRIC_PATTERNS, METRIC_NOT_FOUND),
    outcome: firstMatch(text, OUTCOME_PATTERNS, OUTCOME_NOT_FOUND),
    tool: firstMatch(text, TOOL_PATTERNS, TOOL_NOT_FOUND),
    full_text: text,
  };
}

/**
 * True for a parser default ("[tool not found]") or an empty component
 */
export function isPlaceholder(component: string): boolean {
  const trimmed = component.trim();
  return trimmed.length === 0 || PLACEHOLDER_PATTERN.test(trimmed);
}
