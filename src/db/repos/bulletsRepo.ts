/**
 * Generated bullets repository
 *
 * Data access layer for generated_bullets table.
 */

import type { BulletStatus, GeneratedBulletRow, ProvenanceBullet } from "@/types";
import { parseProvenanceBullet, serializeProvenanceBullet } from "@/serialization";
import { getDb } from "../connection";

/**
 * Insert or replace a bullet (keyed by bullet id)
 */
export function saveProvenanceBullet(coverageMapId: number, bullet: ProvenanceBullet): void {
  const db = getDb();

  db.prepare(
    `
    INSERT INTO generated_bullets (
      id, coverage_map_id, requirement_text, text,
      status, recommendation, verification_rate, payload
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(id) DO UPDATE SET
      coverage_map_id = excluded.coverage_map_id,
      requirement_text = excluded.requirement_text,
      text = excluded.text,
      status = excluded.status,
      recommendation = excluded.recommendation,
      verification_rate = excluded.verification_rate,
      payload = excluded.payload,
      updated_at = datetime('now')
  `,
  ).run(
    bullet.id,
    coverageMapId,
    bullet.requirement_text,
    bullet.text,
    bullet.status,
    bullet.recommendation,
    bullet.verification_rate,
    serializeProvenanceBullet(bullet),
  );
}

/**
 * Bullets of a coverage map in insertion order
 */
export function listBulletsForCoverageMap(coverageMapId: number): ProvenanceBullet[] {
  const db = getDb();
  return db
    .prepare<[number], GeneratedBulletRow>(
      "SELECT * FROM generated_bullets WHERE coverage_map_id = ? ORDER BY rowid",
    )
    .all(coverageMapId)
    .map((row) => parseProvenanceBullet(row.payload));
}

/**
 * Change a bullet's status (column and payload)
 * Returns false if the bullet does not exist
 */
export function updateBulletStatus(bulletId: string, status: BulletStatus): boolean {
  const db = getDb();

  const row = db
    .prepare<[string], GeneratedBulletRow>("SELECT * FROM generated_bullets WHERE id = ?")
    .get(bulletId);
  if (!row) {
    return false;
  }

  const bullet = { ...parseProvenanceBullet(row.payload), status };
  db.prepare(
    `
    UPDATE generated_bullets
    SET status = ?, payload = ?, updated_at = datetime('now')
    WHERE id = ?
  `,
  ).run(status, serializeProvenanceBullet(bullet), bulletId);

  return true;
}
