/**
 * Bullet verification aggregator
 */

import type {
  AMOTComponents,
  BulletVerificationResult,
  ComponentVerification,
  Recommendation,
} from "@/types";
import {
  ACCEPTABLE_VERIFICATION_RATE,
  AMOT_COMPONENT_ORDER,
  REVIEW_VERIFICATION_RATE,
} from "@/constants";

function recommend(verifiedCount: number, rate: number): Recommendation {
  if (verifiedCount === AMOT_COMPONENT_ORDER.length) return "accept";
  if (rate >= ACCEPTABLE_VERIFICATION_RATE) return "accept_with_note";
  if (rate >= REVIEW_VERIFICATION_RATE) return "flag_for_review";
  return "reject";
}

function explain(
  verifications: ComponentVerification[],
  verifiedCount: number,
  rate: number,
): string {
  const total = AMOT_COMPONENT_ORDER.length;
  if (verifiedCount === total) {
    return "All AMOT components verified against evidence";
  }
  if (rate >= ACCEPTABLE_VERIFICATION_RATE) {
    const unverified = verifications
      .filter((v) => !v.is_verified)
      .map((v) => v.component_name)
      .join(", ");
    return `Mostly verified (${verifiedCount}/${total}). Unverified: ${unverified}`;
  }
  if (rate >= REVIEW_VERIFICATION_RATE) {
    return `Partially verified (${verifiedCount}/${total}). User should review.`;
  }
  return `Insufficiently verified (${verifiedCount}/${total}). Move to suggested edits.`;
}

/**
 * Fold four component verifications (action, metric, outcome, tool)
 * into a bullet-level result.
 */
export function buildBulletVerificationResult(
  bulletText: string,
  components: AMOTComponents,
  verifications: ComponentVerification[],
): BulletVerificationResult {
  const verifiedCount = verifications.filter((v) => v.is_verified).length;
  const rate = verifiedCount / AMOT_COMPONENT_ORDER.length;

  const evidenceIds: string[] = [];
  for (const v of verifications) {
    if (v.is_verified && v.supporting_evidence && !evidenceIds.includes(v.supporting_evidence)) {
      evidenceIds.push(v.supporting_evidence);
    }
  }

  return {
    bullet_text: bulletText,
    amot_components: components,
    component_verifications: verifications,
    verified_count: verifiedCount,
    overall_verification_rate: rate,
    is_fully_verified: verifiedCount === AMOT_COMPONENT_ORDER.length,
    is_acceptable: rate >= ACCEPTABLE_VERIFICATION_RATE,
    recommendation: recommend(verifiedCount, rate),
    explanation: explain(verifications, verifiedCount, rate),
    evidence_ids: evidenceIds,
  };
}
