/**
 * Coverage aggregator
 *
 * Rolls per-requirement coverage up into the CoverageMap: priority
 * partitions, weighted scores, top evidence and critical gaps.
 */

import type {
  CoverageMap,
  CoverageThresholds,
  EvidenceMatch,
  EvidenceSpan,
  RequirementCoverage,
  SimilarityMatrix,
} from "@/types";
import {
  DEFAULT_COVERAGE_THRESHOLDS,
  MUST_HAVE_WEIGHT,
  NICE_TO_HAVE_WEIGHT,
  TOP_EVIDENCE_LIMIT,
} from "@/constants";
import { columnArgMax, columnMax } from "./similarity";
import { findCommonKeywords } from "./keywords";

export type BuildCoverageMapInput = {
  jobId: string;
  profileId: string;
  /** One entry per matrix row, same order */
  requirementCoverage: RequirementCoverage[];
  evidence: EvidenceSpan[];
  matrix: SimilarityMatrix;
  thresholds?: CoverageThresholds;
};

function coveredFraction(group: RequirementCoverage[]): number {
  if (group.length === 0) return 0;
  return group.filter((rc) => rc.is_covered).length / group.length;
}

/**
 * Blend must-have and nice-to-have scores, kept between the two; a
 * single non-empty group stands on its own.
 */
export function overallCoverageScore(
  mustHaves: RequirementCoverage[],
  niceToHaves: RequirementCoverage[],
): number {
  const mustScore = coveredFraction(mustHaves);
  const niceScore = coveredFraction(niceToHaves);

  if (mustHaves.length > 0 && niceToHaves.length > 0) {
    const blended = MUST_HAVE_WEIGHT * mustScore + NICE_TO_HAVE_WEIGHT * niceScore;
    // Rounding can land just outside the two scores (0.7 * 0.75 + 0.3 * 0.75 < 0.75)
    const low = Math.min(mustScore, niceScore);
    const high = Math.max(mustScore, niceScore);
    return Math.min(high, Math.max(low, blended));
  }
  if (mustHaves.length > 0) return mustScore;
  if (niceToHaves.length > 0) return niceScore;
  return 0;
}

/**
 * Evidence ranked by its best score against any requirement.
 *
 * Ties keep evidence order; entries below the weak-match threshold are
 * dropped.
 */
export function topMatchingEvidence(
  requirementCoverage: RequirementCoverage[],
  evidence: EvidenceSpan[],
  matrix: SimilarityMatrix,
  weakMatch: number,
): EvidenceMatch[] {
  const maxima = columnMax(matrix, evidence.length);

  const ranked = evidence
    .map((ev, j) => ({ ev, j, score: maxima[j] }))
    .sort((a, b) => b.score - a.score)
    .slice(0, TOP_EVIDENCE_LIMIT)
    .filter((entry) => entry.score >= weakMatch);

  const matches: EvidenceMatch[] = [];
  for (const { ev, j, score } of ranked) {
    const best = requirementCoverage[columnArgMax(matrix, j)];
    if (!best) continue;
    matches.push({
      evidence_id: ev.id,
      evidence_text: ev.text,
      evidence_source: ev.source_type,
      evidence_source_id: ev.source_id,
      similarity_score: score,
      keywords_matched: findCommonKeywords(best.requirement_text, ev.text),
      best_requirement_text: best.requirement_text,
    });
  }
  return matches;
}

export function buildCoverageMap(input: BuildCoverageMapInput): CoverageMap {
  const thresholds = input.thresholds ?? DEFAULT_COVERAGE_THRESHOLDS;
  const all = input.requirementCoverage;

  const mustHaves = all.filter((rc) => rc.requirement_priority === "must_have");
  const niceToHaves = all.filter((rc) => rc.requirement_priority === "nice_to_have");

  return {
    job_id: input.jobId,
    profile_id: input.profileId,
    requirement_coverage: all,
    covered_requirements: all.filter((rc) => rc.is_covered).map((rc) => rc.requirement_text),
    gap_requirements: all.filter((rc) => !rc.is_covered).map((rc) => rc.requirement_text),
    overall_coverage_score: overallCoverageScore(mustHaves, niceToHaves),
    must_have_coverage_score: coveredFraction(mustHaves),
    nice_to_have_coverage_score: coveredFraction(niceToHaves),
    top_matching_evidence: topMatchingEvidence(
      all,
      input.evidence,
      input.matrix,
      thresholds.weakMatch,
    ),
    critical_gaps: mustHaves.filter((rc) => !rc.is_covered),
  };
}
