/**
 * Coverage mapping type definitions
 *
 * Shapes produced by the similarity engine, coverage analyzer and
 * aggregator. Field names are snake_case because these objects are the
 * persisted/serialized form as well.
 */

import type {
  RequirementCategory,
  RequirementPriority,
} from "./requirements";
import type { EvidenceSourceType } from "./profile";

export type GapSeverity = "high" | "medium" | "low";

/**
 * One piece of evidence matched to one requirement.
 *
 * Regenerated on every coverage computation; not an identity.
 */
export type EvidenceMatch = {
  evidence_id: string;
  evidence_text: string;
  evidence_source: EvidenceSourceType;
  evidence_source_id: string;
  /** Cosine similarity clipped to [0, 1] */
  similarity_score: number;
  /** Words shared by requirement and evidence (explainability) */
  keywords_matched: string[];
  /** Requirement that produced the best score (top evidence entries only) */
  best_requirement_text?: string;
};

/**
 * Coverage analysis of a single requirement.
 *
 * Invariants:
 * - best_match_score equals the highest matched similarity (0 when none)
 * - is_covered implies best_match_score >= threshold(priority)
 */
export type RequirementCoverage = {
  requirement_text: string;
  requirement_priority: RequirementPriority;
  requirement_category: RequirementCategory;
  requirement_keywords: string[];
  /** Sorted by similarity descending, ties in evidence order */
  matched_evidence: EvidenceMatch[];
  best_match_score: number;
  is_covered: boolean;
  /** Distance from the threshold, scaled by the ambiguity window */
  coverage_confidence: number;
  /** null when covered */
  gap_severity: GapSeverity | null;
  suggested_actions: string[];
};

/**
 * Aggregate root for one (job, profile) analysis.
 */
export type CoverageMap = {
  job_id: string;
  profile_id: string;
  requirement_coverage: RequirementCoverage[];
  covered_requirements: string[];
  gap_requirements: string[];
  overall_coverage_score: number;
  must_have_coverage_score: number;
  nice_to_have_coverage_score: number;
  /** At most 10 entries */
  top_matching_evidence: EvidenceMatch[];
  /** Uncovered must-have requirements */
  critical_gaps: RequirementCoverage[];
};

/**
 * Coverage map plus run metadata.
 */
export type CoverageMapResult = {
  coverage_map: CoverageMap;
  execution_time_ms: number;
  embedding_provider: string;
  total_evidence_items: number;
  total_requirements: number;
};

/**
 * Similarity thresholds and the confidence window.
 *
 * All values are tunables; defaults live in @/constants/coverage.
 */
export type CoverageThresholds = {
  mustHaveCovered: number;
  niceToHaveCovered: number;
  weakMatch: number;
  /** Distance from the threshold at which confidence reaches 1 */
  ambiguityWindow: number;
};

/** Row-major [requirements][evidence] similarity matrix */
export type SimilarityMatrix = number[][];
