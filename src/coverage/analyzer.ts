/**
 * Coverage analyzer
 *
 * Turns one similarity row per requirement into a RequirementCoverage:
 * ranked evidence, covered/gap decision, confidence, gap severity and
 * suggested actions.
 *
 * Must-haves use a stricter threshold than nice-to-haves, so moving a
 * requirement from nice_to_have to must_have can only keep or lose
 * coverage, never gain it.
 */

import type {
  CoverageThresholds,
  EvidenceMatch,
  EvidenceSpan,
  GapSeverity,
  Requirement,
  RequirementCoverage,
  RequirementPriority,
  SimilarityMatrix,
} from "@/types";
import {
  DEFAULT_COVERAGE_THRESHOLDS,
  GAP_MEDIUM_BELOW_SCORE,
} from "@/constants";
import { InvalidInputError } from "@/errors";
import { findCommonKeywords } from "./keywords";

export function coverageThreshold(
  priority: RequirementPriority,
  thresholds: CoverageThresholds = DEFAULT_COVERAGE_THRESHOLDS,
): number {
  return priority === "must_have"
    ? thresholds.mustHaveCovered
    : thresholds.niceToHaveCovered;
}

/**
 * Confidence in the covered/gap decision: low near the threshold,
 * saturating at 1 once the best score is a full window away.
 */
export function coverageConfidence(
  bestMatchScore: number,
  threshold: number,
  ambiguityWindow: number,
): number {
  return Math.min(1, Math.abs(bestMatchScore - threshold) / ambiguityWindow);
}

function gapSeverity(priority: RequirementPriority, bestMatchScore: number): GapSeverity {
  if (priority === "must_have") {
    return "high";
  }
  return bestMatchScore < GAP_MEDIUM_BELOW_SCORE ? "medium" : "low";
}

function suggestedActions(requirement: Requirement): string[] {
  const actions: string[] = [
    requirement.priority === "must_have"
      ? `CRITICAL: Add evidence of '${requirement.text}' to your profile`
      : `Consider adding examples of '${requirement.text}' if applicable`,
  ];

  switch (requirement.category) {
    case "technical":
      actions.push(
        "Add projects, certifications, or work examples demonstrating this skill",
      );
      break;
    case "experience":
      actions.push("Highlight any relevant experience, even if from different roles");
      break;
    case "certification":
      actions.push("List the credential (or one in progress) under certifications");
      break;
    case "soft_skill":
      actions.push("Add a concrete example where you demonstrated this behaviour");
      break;
    case "other":
      break;
  }

  return actions;
}

/**
 * Build ranked matches for one requirement row.
 *
 * Only evidence at or above the weak-match threshold is kept. The sort
 * is stable, so equal scores keep evidence order.
 */
function rankMatches(
  requirement: Requirement,
  row: number[],
  evidence: EvidenceSpan[],
  weakMatch: number,
): EvidenceMatch[] {
  const matches: EvidenceMatch[] = [];

  evidence.forEach((ev, j) => {
    const score = row[j];
    if (score < weakMatch) return;
    matches.push({
      evidence_id: ev.id,
      evidence_text: ev.text,
      evidence_source: ev.source_type,
      evidence_source_id: ev.source_id,
      similarity_score: score,
      keywords_matched: findCommonKeywords(requirement.text, ev.text),
    });
  });

  return matches.sort((a, b) => b.similarity_score - a.similarity_score);
}

/**
 * Analyze a single requirement against its similarity row
 */
export function analyzeRequirement(
  requirement: Requirement,
  row: number[],
  evidence: EvidenceSpan[],
  thresholds: CoverageThresholds = DEFAULT_COVERAGE_THRESHOLDS,
): RequirementCoverage {
  const matched = rankMatches(requirement, row, evidence, thresholds.weakMatch);
  const bestMatchScore = matched.length > 0 ? matched[0].similarity_score : 0;
  const threshold = coverageThreshold(requirement.priority, thresholds);
  const isCovered = bestMatchScore >= threshold;

  return {
    requirement_text: requirement.text,
    requirement_priority: requirement.priority,
    requirement_category: requirement.category,
    requirement_keywords: [...requirement.keywords],
    matched_evidence: matched,
    best_match_score: bestMatchScore,
    is_covered: isCovered,
    coverage_confidence: coverageConfidence(
      bestMatchScore,
      threshold,
      thresholds.ambiguityWindow,
    ),
    gap_severity: isCovered ? null : gapSeverity(requirement.priority, bestMatchScore),
    suggested_actions: isCovered ? [] : suggestedActions(requirement),
  };
}

/**
 * Analyze every requirement; row i of the matrix belongs to requirement i.
 *
 * @throws {InvalidInputError} If the matrix shape does not match the inputs
 */
export function analyzeRequirementCoverage(
  requirements: Requirement[],
  evidence: EvidenceSpan[],
  matrix: SimilarityMatrix,
  thresholds: CoverageThresholds = DEFAULT_COVERAGE_THRESHOLDS,
): RequirementCoverage[] {
  if (matrix.length !== requirements.length) {
    throw new InvalidInputError(
      `Similarity matrix has ${matrix.length} rows for ${requirements.length} requirements`,
    );
  }
  matrix.forEach((row, i) => {
    if (row.length !== evidence.length) {
      throw new InvalidInputError(
        `Similarity row ${i} has ${row.length} columns for ${evidence.length} evidence items`,
      );
    }
  });

  return requirements.map((requirement, i) =>
    analyzeRequirement(requirement, matrix[i], evidence, thresholds),
  );
}
