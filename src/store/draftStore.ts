/**
 * In-memory resume draft store
 *
 * Owned by whoever creates it (CLI run, test); never a module-level
 * singleton. Bullets are keyed by id, so re-writing a bullet replaces it.
 * Drafts handed out are copies; changes go through the store.
 */

import { randomUUID } from "crypto";
import type { DraftBulletState, ProvenanceBullet, ResumeDraft } from "@/types";
import { InvalidInputError } from "@/errors";

export class DraftStore {
  private readonly drafts = new Map<string, ResumeDraft>();

  create(jobId: string, profileId: string, id: string = randomUUID()): ResumeDraft {
    if (this.drafts.has(id)) {
      throw new InvalidInputError(`Draft ${id} already exists`);
    }
    const draft: ResumeDraft = {
      id,
      job_id: jobId,
      profile_id: profileId,
      bullets: [],
      accepted_count: 0,
    };
    this.drafts.set(id, draft);
    return structuredClone(draft);
  }

  get(id: string): ResumeDraft | undefined {
    const draft = this.drafts.get(id);
    return draft ? structuredClone(draft) : undefined;
  }

  /**
   * Add bullets as pending; an existing bullet with the same id is
   * replaced and goes back to pending.
   */
  upsertBullets(draftId: string, bullets: ProvenanceBullet[]): ResumeDraft {
    const draft = this.require(draftId);
    for (const bullet of bullets) {
      const index = draft.bullets.findIndex((b) => b.bullet.id === bullet.id);
      const entry = { bullet: structuredClone(bullet), state: "pending" as const };
      if (index >= 0) {
        draft.bullets[index] = entry;
      } else {
        draft.bullets.push(entry);
      }
    }
    return this.recount(draft);
  }

  setAccepted(draftId: string, bulletId: string): ResumeDraft {
    return this.setState(draftId, bulletId, "accepted");
  }

  setRejected(draftId: string, bulletId: string): ResumeDraft {
    return this.setState(draftId, bulletId, "rejected");
  }

  clear(): void {
    this.drafts.clear();
  }

  private setState(draftId: string, bulletId: string, state: DraftBulletState): ResumeDraft {
    const draft = this.require(draftId);
    const entry = draft.bullets.find((b) => b.bullet.id === bulletId);
    if (!entry) {
      throw new InvalidInputError(`Bullet ${bulletId} not found in draft ${draftId}`);
    }
    entry.state = state;
    return this.recount(draft);
  }

  private recount(draft: ResumeDraft): ResumeDraft {
    draft.accepted_count = draft.bullets.filter((b) => b.state === "accepted").length;
    return structuredClone(draft);
  }

  private require(id: string): ResumeDraft {
    const draft = this.drafts.get(id);
    if (!draft) {
      throw new InvalidInputError(`Draft ${id} not found`);
    }
    return draft;
  }
}
