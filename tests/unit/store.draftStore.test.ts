import { describe, it, expect } from "vitest";
import { DraftStore } from "@/store";
import { InvalidInputError } from "@/errors";
import type { ProvenanceBullet } from "@/types";
import { buildBulletVerificationResult, parseAmot } from "@/verification";

function bullet(id: string, text = "Led Python team"): ProvenanceBullet {
  const verification = buildBulletVerificationResult(text, parseAmot(text), []);
  return {
    id,
    text,
    requirement_text: "Python",
    evidence_ids: [],
    evidence_texts: [],
    similarity_scores: [],
    action: "Led",
    metric: "[metric not found]",
    outcome: "[outcome not found]",
    tool: "[tool not found]",
    verification,
    is_verified: false,
    verification_rate: 0,
    status: "suggested_edit",
    recommendation: "reject",
    generated_by: "mock-completion",
    generated_at: "2026-01-01T00:00:00.000Z",
  };
}

describe("DraftStore", () => {
  it("should create and fetch drafts", () => {
    const store = new DraftStore();
    const draft = store.create("job-1", "profile-1", "draft-1");

    expect(draft).toEqual({
      id: "draft-1",
      job_id: "job-1",
      profile_id: "profile-1",
      bullets: [],
      accepted_count: 0,
    });
    expect(store.get("draft-1")).toEqual(draft);
    expect(store.get("missing")).toBeUndefined();
  });

  it("should generate ids when none are given", () => {
    const store = new DraftStore();
    expect(store.create("job-1", "profile-1").id).not.toBe(
      store.create("job-1", "profile-1").id,
    );
  });

  it("should refuse a duplicate draft id", () => {
    const store = new DraftStore();
    store.create("job-1", "profile-1", "draft-1");
    expect(() => store.create("job-1", "profile-1", "draft-1")).toThrow(InvalidInputError);
  });

  it("should add bullets as pending and replace by id", () => {
    const store = new DraftStore();
    store.create("job-1", "profile-1", "d");
    store.upsertBullets("d", [bullet("b1"), bullet("b2")]);
    store.setAccepted("d", "b1");

    const draft = store.upsertBullets("d", [bullet("b1", "Rewritten bullet")]);
    expect(draft.bullets.map((b) => [b.bullet.id, b.bullet.text, b.state])).toEqual([
      ["b1", "Rewritten bullet", "pending"],
      ["b2", "Led Python team", "pending"],
    ]);
    expect(draft.accepted_count).toBe(0);
  });

  it("should track accepted bullets", () => {
    const store = new DraftStore();
    store.create("job-1", "profile-1", "d");
    store.upsertBullets("d", [bullet("b1"), bullet("b2")]);

    expect(store.setAccepted("d", "b1").accepted_count).toBe(1);
    expect(store.setAccepted("d", "b2").accepted_count).toBe(2);
    expect(store.setRejected("d", "b1").accepted_count).toBe(1);
  });

  it("should reject unknown drafts and bullets", () => {
    const store = new DraftStore();
    store.create("job-1", "profile-1", "d");

    expect(() => store.upsertBullets("nope", [])).toThrow("Draft nope not found");
    expect(() => store.setAccepted("d", "b9")).toThrow("Bullet b9 not found in draft d");
  });

  it("should not let callers change stored drafts", () => {
    const store = new DraftStore();
    store.create("job-1", "profile-1", "d");
    store.upsertBullets("d", [bullet("b1")]);

    const copy = store.get("d");
    if (!copy) throw new Error("draft missing");
    copy.bullets[0].state = "accepted";
    copy.bullets[0].bullet.evidence_ids.push("ev-forged");
    copy.accepted_count = 1;

    const stored = store.get("d");
    expect(stored?.bullets[0].state).toBe("pending");
    expect(stored?.bullets[0].bullet.evidence_ids).toEqual([]);
    expect(stored?.accepted_count).toBe(0);
  });

  it("should forget everything on clear", () => {
    const store = new DraftStore();
    store.create("job-1", "profile-1", "d");
    store.clear();
    expect(store.get("d")).toBeUndefined();
  });
});
