/**
 * Draft store type definitions
 */

import type { ProvenanceBullet } from "./generation";

export type DraftBulletState = "pending" | "accepted" | "rejected";

export type DraftBullet = {
  bullet: ProvenanceBullet;
  state: DraftBulletState;
};

/**
 * Resume draft for one (job, profile) tailoring run.
 */
export type ResumeDraft = {
  id: string;
  job_id: string;
  profile_id: string;
  bullets: DraftBullet[];
  accepted_count: number;
};
