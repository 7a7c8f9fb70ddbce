/**
 * Read-only queries over a CoverageMap
 */

import type { CoverageMap, EvidenceMatch, RequirementCoverage } from "@/types";
import {
  DEFAULT_TOP_EVIDENCE_PER_REQUIREMENT,
  STRONG_EVIDENCE_THRESHOLD,
  STRONG_MATCH_MUST_HAVE_SCORE,
} from "@/constants";

const byScoreDesc = (a: RequirementCoverage, b: RequirementCoverage): number =>
  b.best_match_score - a.best_match_score;

/**
 * Requirements in generation order: covered must-haves, then covered
 * nice-to-haves (each by best score, descending), then uncovered
 * must-haves. Uncovered nice-to-haves are left out.
 */
export function getPrioritizedRequirements(map: CoverageMap): RequirementCoverage[] {
  const all = map.requirement_coverage;
  const coveredMust = all
    .filter((rc) => rc.requirement_priority === "must_have" && rc.is_covered)
    .sort(byScoreDesc);
  const coveredNice = all
    .filter((rc) => rc.requirement_priority === "nice_to_have" && rc.is_covered)
    .sort(byScoreDesc);
  const uncoveredMust = all.filter(
    (rc) => rc.requirement_priority === "must_have" && !rc.is_covered,
  );

  return [...coveredMust, ...coveredNice, ...uncoveredMust];
}

export function getTopEvidence(
  coverage: RequirementCoverage,
  n: number = DEFAULT_TOP_EVIDENCE_PER_REQUIREMENT,
): EvidenceMatch[] {
  return coverage.matched_evidence.slice(0, n);
}

export function hasStrongEvidence(
  coverage: RequirementCoverage,
  threshold: number = STRONG_EVIDENCE_THRESHOLD,
): boolean {
  return coverage.best_match_score >= threshold;
}

/**
 * Strong overall match: the must-have coverage score clears the bar
 */
export function isStrongMatch(
  map: CoverageMap,
  threshold: number = STRONG_MATCH_MUST_HAVE_SCORE,
): boolean {
  return map.must_have_coverage_score >= threshold;
}

/**
 * Matched evidence for a requirement by exact text; empty when unknown
 */
export function getEvidenceForRequirement(
  map: CoverageMap,
  requirementText: string,
): EvidenceMatch[] {
  const found = map.requirement_coverage.find(
    (rc) => rc.requirement_text === requirementText,
  );
  return found ? found.matched_evidence : [];
}

export function getMustHaveCoverage(map: CoverageMap): RequirementCoverage[] {
  return map.requirement_coverage.filter((rc) => rc.requirement_priority === "must_have");
}

export function getNiceToHaveCoverage(map: CoverageMap): RequirementCoverage[] {
  return map.requirement_coverage.filter(
    (rc) => rc.requirement_priority === "nice_to_have",
  );
}
