/**
 * Allowed values of the string unions, for runtime validation of
 * loaded and persisted payloads
 */

import type {
  AmotComponentName,
  BulletStatus,
  EvidenceSourceType,
  GapSeverity,
  Recommendation,
  RequirementCategory,
  RequirementPriority,
  VerificationMethod,
} from "@/types";

export const REQUIREMENT_CATEGORIES: readonly RequirementCategory[] = [
  "technical",
  "soft_skill",
  "experience",
  "certification",
  "other",
];

export const REQUIREMENT_PRIORITIES: readonly RequirementPriority[] = [
  "must_have",
  "nice_to_have",
];

export const EVIDENCE_SOURCE_TYPES: readonly EvidenceSourceType[] = [
  "experience",
  "education",
  "project",
  "certification",
];

export const GAP_SEVERITIES: readonly GapSeverity[] = ["high", "medium", "low"];

export const AMOT_COMPONENT_NAMES: readonly AmotComponentName[] = [
  "action",
  "metric",
  "outcome",
  "tool",
];

export const VERIFICATION_METHODS: readonly VerificationMethod[] = [
  "exact_match",
  "semantic_match",
  "keyword_match",
  "placeholder_match",
  "no_match",
];

export const RECOMMENDATIONS: readonly Recommendation[] = [
  "accept",
  "accept_with_note",
  "flag_for_review",
  "reject",
];

export const BULLET_STATUSES: readonly BulletStatus[] = ["proposed", "suggested_edit"];
