/**
 * CoverageMap JSON codec
 *
 * The serialized form is the snake_case object itself. Parsing validates
 * every field and rebuilds the map, so unknown keys are dropped.
 */

import type { CoverageMap, EvidenceMatch, RequirementCoverage } from "@/types";
import {
  EVIDENCE_SOURCE_TYPES,
  GAP_SEVERITIES,
  REQUIREMENT_CATEGORIES,
  REQUIREMENT_PRIORITIES,
  TOP_EVIDENCE_LIMIT,
} from "@/constants";
import {
  type JsonRecord,
  readBoolean,
  readEnum,
  readList,
  readNullableEnum,
  readOptionalString,
  readString,
  readStringArray,
  readUnitInterval,
} from "@/utils";
import { failSerialization as fail, parseJsonRecord } from "./fail";

function readEvidenceMatch(rec: JsonRecord, path: string): EvidenceMatch {
  const match: EvidenceMatch = {
    evidence_id: readString(rec, "evidence_id", path, fail, { nonEmpty: true }),
    evidence_text: readString(rec, "evidence_text", path, fail),
    evidence_source: readEnum(rec, "evidence_source", EVIDENCE_SOURCE_TYPES, path, fail),
    evidence_source_id: readString(rec, "evidence_source_id", path, fail),
    similarity_score: readUnitInterval(rec, "similarity_score", path, fail),
    keywords_matched: readStringArray(rec, "keywords_matched", path, fail),
  };
  const best = readOptionalString(rec, "best_requirement_text", path, fail);
  if (best !== undefined) {
    match.best_requirement_text = best;
  }
  return match;
}

function readRequirementCoverage(rec: JsonRecord, path: string): RequirementCoverage {
  const coverage: RequirementCoverage = {
    requirement_text: readString(rec, "requirement_text", path, fail, { nonEmpty: true }),
    requirement_priority: readEnum(
      rec,
      "requirement_priority",
      REQUIREMENT_PRIORITIES,
      path,
      fail,
    ),
    requirement_category: readEnum(
      rec,
      "requirement_category",
      REQUIREMENT_CATEGORIES,
      path,
      fail,
    ),
    requirement_keywords: readStringArray(rec, "requirement_keywords", path, fail),
    matched_evidence: readList(rec, "matched_evidence", path, fail, readEvidenceMatch),
    best_match_score: readUnitInterval(rec, "best_match_score", path, fail),
    is_covered: readBoolean(rec, "is_covered", path, fail),
    coverage_confidence: readUnitInterval(rec, "coverage_confidence", path, fail),
    gap_severity: readNullableEnum(rec, "gap_severity", GAP_SEVERITIES, path, fail),
    suggested_actions: readStringArray(rec, "suggested_actions", path, fail),
  };

  if (coverage.is_covered && coverage.gap_severity !== null) {
    fail(`${path} is covered but has gap_severity "${coverage.gap_severity}"`);
  }
  return coverage;
}

export function serializeCoverageMap(map: CoverageMap): string {
  return JSON.stringify(map);
}

/**
 * @throws {SerializationError} Invalid JSON or a field of the wrong shape
 */
export function parseCoverageMap(json: string): CoverageMap {
  const path = "coverage_map";
  const rec = parseJsonRecord(json, path);

  const map: CoverageMap = {
    job_id: readString(rec, "job_id", path, fail, { nonEmpty: true }),
    profile_id: readString(rec, "profile_id", path, fail, { nonEmpty: true }),
    requirement_coverage: readList(
      rec,
      "requirement_coverage",
      path,
      fail,
      readRequirementCoverage,
    ),
    covered_requirements: readStringArray(rec, "covered_requirements", path, fail),
    gap_requirements: readStringArray(rec, "gap_requirements", path, fail),
    overall_coverage_score: readUnitInterval(rec, "overall_coverage_score", path, fail),
    must_have_coverage_score: readUnitInterval(rec, "must_have_coverage_score", path, fail),
    nice_to_have_coverage_score: readUnitInterval(
      rec,
      "nice_to_have_coverage_score",
      path,
      fail,
    ),
    top_matching_evidence: readList(
      rec,
      "top_matching_evidence",
      path,
      fail,
      readEvidenceMatch,
    ),
    critical_gaps: readList(rec, "critical_gaps", path, fail, readRequirementCoverage),
  };

  if (map.top_matching_evidence.length > TOP_EVIDENCE_LIMIT) {
    fail(`${path}.top_matching_evidence has more than ${TOP_EVIDENCE_LIMIT} entries`);
  }
  return map;
}
