/**
 * Verification constants
 *
 * Confidence values, AMOT extraction patterns and the recommendation
 * thresholds used by the component verifier and bullet aggregator.
 */

import type { AmotComponentName } from "@/types";

export const AMOT_COMPONENT_ORDER: readonly AmotComponentName[] = [
  "action",
  "metric",
  "outcome",
  "tool",
];

/**
 * Confidence per verification method
 */
export const CONFIDENCE = {
  exact: 1.0,
  keyword: 0.9,
  semantic: 0.85,
  placeholder: 0.7,
  /** A no_match is a certain absence, not a weak guess */
  noMatch: 1.0,
} as const;

/**
 * Placeholders emitted by the AMOT parser for missing components
 */
export const METRIC_NOT_FOUND = "[metric not found]";
export const OUTCOME_NOT_FOUND = "[outcome not found]";
export const TOOL_NOT_FOUND = "[tool not found]";

/**
 * Metric patterns in priority order: percentage, currency amount,
 * count phrase ("50+ services"), bracketed placeholder ("[X%]").
 */
export const METRIC_PATTERNS: readonly RegExp[] = [
  /\d+%/,
  /[$£€]\d[\d,.]*[KMB]?/,
  /\d+\+?\s+\w+/,
  /\[[$£€]?[A-Z0-9%]+\]/,
];

/**
 * Outcome indicator phrases, captured up to the next , . or ;
 */
export const OUTCOME_PATTERNS: readonly RegExp[] = [
  /resulting in [^,.;]+/i,
  /leading to [^,.;]+/i,
  /achiev(?:ing|ed) [^,.;]+/i,
  /driving [^,.;]+/i,
];

/**
 * Method/technology indicator phrases, captured up to the next , . or ;
 */
export const TOOL_PATTERNS: readonly RegExp[] = [
  /via [^,.;]+/i,
  /using [^,.;]+/i,
  /through [^,.;]+/i,
  /leveraging [^,.;]+/i,
];

export const TOOL_PREPOSITION_PATTERN = /^(via|using|through|leveraging)\s+/i;

/**
 * Number extraction for strict metric matching
 */
export const METRIC_NUMBER_PATTERN = /\d+(?:\.\d+)?/g;

/**
 * Evidence "has some metric" check for placeholder metrics
 */
export const EVIDENCE_NUMERIC_PATTERN = /\d+%|\$\d+/;

/**
 * Outcome words that must appear in one evidence text for keyword_match
 */
export const OUTCOME_MIN_KEYWORD_OVERLAP = 2;

/**
 * Semantic equivalence check parameters (deterministic YES/NO)
 */
export const SEMANTIC_CHECK_MAX_TOKENS = 10;
export const SEMANTIC_CHECK_TEMPERATURE = 0;
export const SEMANTIC_CHECK_ACCEPT_ANSWER = "YES";

/**
 * Verification rate at or above which a bullet is acceptable
 */
export const ACCEPTABLE_VERIFICATION_RATE = 0.75;

/**
 * Verification rate at or above which a bullet is flagged rather than rejected
 */
export const REVIEW_VERIFICATION_RATE = 0.5;
