import type { BulletGenerationResult, ProvenanceBullet, VerificationStats } from "@/types";

export function getAllBullets(result: BulletGenerationResult): ProvenanceBullet[] {
  return [...result.proposed_bullets, ...result.suggested_edits];
}

/**
 * Verification summary over all generated bullets (zeros when none)
 */
export function getVerificationStats(result: BulletGenerationResult): VerificationStats {
  const bullets = getAllBullets(result);
  const total = bullets.length;

  if (total === 0) {
    return {
      total_bullets: 0,
      proposed_count: 0,
      suggested_edit_count: 0,
      average_verification_rate: 0,
      fully_verified_rate: 0,
    };
  }

  const rateSum = bullets.reduce((sum, b) => sum + b.verification_rate, 0);
  const fullyVerified = bullets.filter((b) => b.is_verified).length;

  return {
    total_bullets: total,
    proposed_count: result.proposed_bullets.length,
    suggested_edit_count: result.suggested_edits.length,
    average_verification_rate: rateSum / total,
    fully_verified_rate: fullyVerified / total,
  };
}
