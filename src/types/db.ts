/**
 * Database row type definitions
 *
 * Aligned with migrations/0001_init.sql. Payload columns hold the JSON
 * produced by @/serialization.
 */

import type { CoverageMap } from "./coverage";
import type { BulletStatus } from "./generation";
import type { Recommendation } from "./verification";

export type CoverageMapRow = {
  id: number;
  job_id: string;
  profile_id: string;
  overall_coverage_score: number;
  must_have_coverage_score: number;
  nice_to_have_coverage_score: number;
  embedding_provider: string | null;
  payload: string;
  created_at: string;
};

export type GeneratedBulletRow = {
  id: string;
  coverage_map_id: number;
  requirement_text: string;
  text: string;
  status: BulletStatus;
  recommendation: Recommendation;
  verification_rate: number;
  payload: string;
  created_at: string;
  updated_at: string;
};

export type StoredCoverageMap = {
  id: number;
  embeddingProvider: string | null;
  createdAt: string;
  coverageMap: CoverageMap;
};
