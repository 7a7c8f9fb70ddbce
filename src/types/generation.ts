/**
 * Bullet generation type definitions
 */

import type { BulletVerificationResult, Recommendation } from "./verification";

export type BulletStatus = "proposed" | "suggested_edit";

/**
 * Generated bullet with its full provenance chain:
 * requirement -> evidence -> bullet -> verification.
 */
export type ProvenanceBullet = {
  id: string;
  text: string;
  requirement_text: string;
  evidence_ids: string[];
  evidence_texts: string[];
  similarity_scores: number[];
  action: string;
  metric: string;
  outcome: string;
  tool: string;
  verification: BulletVerificationResult;
  is_verified: boolean;
  verification_rate: number;
  status: BulletStatus;
  recommendation: Recommendation;
  generated_by: string;
  /** ISO timestamp */
  generated_at: string;
};

export type GenerationMetadata = {
  total_generated: number;
  proposed_count: number;
  suggested_edit_count: number;
  generation_time_ms: number;
  requirements_processed: number;
  /** Covered requirements beyond maxBulletsPerRole */
  requirements_skipped: number;
  /** Requirements whose generation call failed */
  requirements_failed: number;
};

export type BulletGenerationResult = {
  proposed_bullets: ProvenanceBullet[];
  suggested_edits: ProvenanceBullet[];
  metadata: GenerationMetadata;
};

export type VerificationStats = {
  total_bullets: number;
  proposed_count: number;
  suggested_edit_count: number;
  average_verification_rate: number;
  fully_verified_rate: number;
};

export type GenerationOptions = {
  /** Maximum requirements to generate bullets for */
  maxBulletsPerRole?: number;
  /** Only keep bullets with all four components verified */
  requireFullVerification?: boolean;
  /** Draft to write generated bullets into */
  draftId?: string;
};
