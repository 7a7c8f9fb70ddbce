/**
 * BulletVerificationResult and ProvenanceBullet JSON codecs
 */

import type {
  AMOTComponents,
  BulletVerificationResult,
  ComponentVerification,
  ProvenanceBullet,
} from "@/types";
import {
  AMOT_COMPONENT_NAMES,
  BULLET_STATUSES,
  RECOMMENDATIONS,
  VERIFICATION_METHODS,
} from "@/constants";
import {
  type JsonRecord,
  expectRecord,
  readBoolean,
  readEnum,
  readList,
  readNullableString,
  readNumber,
  readNumberArray,
  readString,
  readStringArray,
  readUnitInterval,
} from "@/utils";
import { failSerialization as fail, parseJsonRecord } from "./fail";

function readAmotComponents(rec: JsonRecord, path: string): AMOTComponents {
  return {
    action: readString(rec, "action", path, fail),
    metric: readString(rec, "metric", path, fail),
    outcome: readString(rec, "outcome", path, fail),
    tool: readString(rec, "tool", path, fail),
    full_text: readString(rec, "full_text", path, fail),
  };
}

function readComponentVerification(rec: JsonRecord, path: string): ComponentVerification {
  return {
    component_name: readEnum(rec, "component_name", AMOT_COMPONENT_NAMES, path, fail),
    component_text: readString(rec, "component_text", path, fail),
    is_verified: readBoolean(rec, "is_verified", path, fail),
    supporting_evidence: readNullableString(rec, "supporting_evidence", path, fail),
    verification_method: readEnum(
      rec,
      "verification_method",
      VERIFICATION_METHODS,
      path,
      fail,
    ),
    confidence: readUnitInterval(rec, "confidence", path, fail),
    explanation: readString(rec, "explanation", path, fail),
  };
}

function readVerificationResult(rec: JsonRecord, path: string): BulletVerificationResult {
  const result: BulletVerificationResult = {
    bullet_text: readString(rec, "bullet_text", path, fail, { nonEmpty: true }),
    amot_components: readAmotComponents(
      expectRecord(rec.amot_components, `${path}.amot_components`, fail),
      `${path}.amot_components`,
    ),
    component_verifications: readList(
      rec,
      "component_verifications",
      path,
      fail,
      readComponentVerification,
    ),
    verified_count: readNumber(rec, "verified_count", path, fail),
    overall_verification_rate: readUnitInterval(rec, "overall_verification_rate", path, fail),
    is_fully_verified: readBoolean(rec, "is_fully_verified", path, fail),
    is_acceptable: readBoolean(rec, "is_acceptable", path, fail),
    recommendation: readEnum(rec, "recommendation", RECOMMENDATIONS, path, fail),
    explanation: readString(rec, "explanation", path, fail),
    evidence_ids: readStringArray(rec, "evidence_ids", path, fail),
  };

  const names = result.component_verifications.map((v) => v.component_name).join(",");
  if (names !== AMOT_COMPONENT_NAMES.join(",")) {
    fail(`${path}.component_verifications must be action, metric, outcome, tool (got ${names})`);
  }
  return result;
}

export function serializeVerificationResult(result: BulletVerificationResult): string {
  return JSON.stringify(result);
}

/**
 * @throws {SerializationError} Invalid JSON or a field of the wrong shape
 */
export function parseVerificationResult(json: string): BulletVerificationResult {
  const path = "verification";
  return readVerificationResult(parseJsonRecord(json, path), path);
}

export function serializeProvenanceBullet(bullet: ProvenanceBullet): string {
  return JSON.stringify(bullet);
}

/**
 * @throws {SerializationError} Invalid JSON or a field of the wrong shape
 */
export function parseProvenanceBullet(json: string): ProvenanceBullet {
  const path = "bullet";
  const rec = parseJsonRecord(json, path);

  return {
    id: readString(rec, "id", path, fail, { nonEmpty: true }),
    text: readString(rec, "text", path, fail, { nonEmpty: true }),
    requirement_text: readString(rec, "requirement_text", path, fail),
    evidence_ids: readStringArray(rec, "evidence_ids", path, fail),
    evidence_texts: readStringArray(rec, "evidence_texts", path, fail),
    similarity_scores: readNumberArray(rec, "similarity_scores", path, fail),
    action: readString(rec, "action", path, fail),
    metric: readString(rec, "metric", path, fail),
    outcome: readString(rec, "outcome", path, fail),
    tool: readString(rec, "tool", path, fail),
    verification: readVerificationResult(
      expectRecord(rec.verification, `${path}.verification`, fail),
      `${path}.verification`,
    ),
    is_verified: readBoolean(rec, "is_verified", path, fail),
    verification_rate: readUnitInterval(rec, "verification_rate", path, fail),
    status: readEnum(rec, "status", BULLET_STATUSES, path, fail),
    recommendation: readEnum(rec, "recommendation", RECOMMENDATIONS, path, fail),
    generated_by: readString(rec, "generated_by", path, fail),
    generated_at: readString(rec, "generated_at", path, fail),
  };
}
