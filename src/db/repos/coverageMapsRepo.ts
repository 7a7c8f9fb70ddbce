/**
 * Coverage maps repository
 *
 * Data access layer for coverage_maps table.
 */

import type {
  CoverageMap,
  CoverageMapRow,
  ProvenanceBullet,
  StoredCoverageMap,
} from "@/types";
import { parseCoverageMap, serializeCoverageMap } from "@/serialization";
import { getDb } from "../connection";
import { saveProvenanceBullet } from "./bulletsRepo";

function toStored(row: CoverageMapRow): StoredCoverageMap {
  return {
    id: row.id,
    embeddingProvider: row.embedding_provider,
    createdAt: row.created_at,
    coverageMap: parseCoverageMap(row.payload),
  };
}

/**
 * Insert a coverage map
 * Returns the row id
 */
export function saveCoverageMap(
  coverageMap: CoverageMap,
  embeddingProvider: string | null = null,
): number {
  const db = getDb();

  const result = db
    .prepare(
      `
    INSERT INTO coverage_maps (
      job_id, profile_id,
      overall_coverage_score, must_have_coverage_score, nice_to_have_coverage_score,
      embedding_provider, payload
    )
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `,
    )
    .run(
      coverageMap.job_id,
      coverageMap.profile_id,
      coverageMap.overall_coverage_score,
      coverageMap.must_have_coverage_score,
      coverageMap.nice_to_have_coverage_score,
      embeddingProvider,
      serializeCoverageMap(coverageMap),
    );

  return Number(result.lastInsertRowid);
}

/**
 * Insert a coverage map together with its bullets, all or nothing
 * Returns the coverage map row id
 */
export function saveCoverageRun(
  coverageMap: CoverageMap,
  embeddingProvider: string | null,
  bullets: ProvenanceBullet[],
): number {
  const db = getDb();

  const transaction = db.transaction(() => {
    const id = saveCoverageMap(coverageMap, embeddingProvider);
    for (const bullet of bullets) {
      saveProvenanceBullet(id, bullet);
    }
    return id;
  });

  return transaction();
}

/**
 * Get coverage map by id
 *
 * @throws {SerializationError} If the stored payload is corrupt
 */
export function getCoverageMap(id: number): StoredCoverageMap | undefined {
  const db = getDb();
  const row = db
    .prepare<[number], CoverageMapRow>("SELECT * FROM coverage_maps WHERE id = ?")
    .get(id);
  return row ? toStored(row) : undefined;
}

/**
 * All coverage maps of a job, newest first
 */
export function listCoverageMapsForJob(jobId: string): StoredCoverageMap[] {
  const db = getDb();
  return db
    .prepare<[string], CoverageMapRow>(
      "SELECT * FROM coverage_maps WHERE job_id = ? ORDER BY id DESC",
    )
    .all(jobId)
    .map(toStored);
}
