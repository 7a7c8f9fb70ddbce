/**
 * Coverage mapping constants
 *
 * All similarity parameters are defined here so the analyzer and
 * aggregator stay config-driven.
 */

import type { CoverageThresholds } from "@/types";

/**
 * Similarity thresholds.
 *
 * - mustHaveCovered: must-haves need strong evidence to count as covered
 * - niceToHaveCovered: nice-to-haves accept moderate evidence
 * - weakMatch: below this, evidence is considered unrelated
 * - ambiguityWindow: distance from the threshold at which coverage
 *   confidence saturates at 1.0
 *
 * TODO: ambiguityWindow (0.15) has no calibration data behind it yet.
 */
export const DEFAULT_COVERAGE_THRESHOLDS: CoverageThresholds = {
  mustHaveCovered: 0.75,
  niceToHaveCovered: 0.65,
  weakMatch: 0.5,
  ambiguityWindow: 0.15,
};

/**
 * Nice-to-have gaps below this best score are "medium", otherwise "low"
 */
export const GAP_MEDIUM_BELOW_SCORE = 0.5;

/**
 * Weights of the overall coverage blend (when both groups are non-empty)
 */
export const MUST_HAVE_WEIGHT = 0.7;
export const NICE_TO_HAVE_WEIGHT = 0.3;

/**
 * Maximum entries in CoverageMap.top_matching_evidence
 */
export const TOP_EVIDENCE_LIMIT = 10;

/**
 * Default number of evidence matches fed to bullet generation
 */
export const DEFAULT_TOP_EVIDENCE_PER_REQUIREMENT = 3;

/**
 * Evidence at or above this score counts as "strong" for a requirement
 */
export const STRONG_EVIDENCE_THRESHOLD = 0.8;

/**
 * Must-have coverage at or above this score makes a strong overall match
 */
export const STRONG_MATCH_MUST_HAVE_SCORE = 0.7;

/**
 * Words ignored when listing keywords shared by requirement and evidence
 */
export const KEYWORD_STOP_WORDS: ReadonlySet<string> = new Set([
  "the",
  "a",
  "an",
  "and",
  "or",
  "but",
  "in",
  "on",
  "at",
  "to",
  "for",
  "of",
  "with",
  "by",
]);
