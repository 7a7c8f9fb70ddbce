/**
 * Integration Test — Tailoring run
 *
 * JSON inputs on disk -> coverage -> generation -> persistence, as the
 * CLI runs it.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { runTailor } from "@/cli";
import { MockCompletionProvider } from "@/providers";
import { closeDb, getCoverageMap, listBulletsForCoverageMap, openDb } from "@/db";
import type { AppConfig, ProviderBundle } from "@/types";
import { StubEmbeddingProvider, basis, towards } from "../../helpers/stubProviders";

const EVIDENCE_TEXT =
  "Led Python team for 6 years, resulting in 35% delivery speedup using Agile";

const profileJson = {
  id: "profile-7",
  experiences: [
    {
      id: "exp-1",
      company: "Acme",
      title: "Engineering Lead",
      bullets: [EVIDENCE_TEXT],
      evidence_ids: ["ev-1"],
    },
  ],
};

const jobJson = {
  title: "Backend Lead",
  must_have_requirements: [{ text: "Python leadership", category: "experience" }],
  nice_to_have_requirements: [{ text: "Kubernetes", category: "technical" }],
};

function providers(): ProviderBundle {
  return {
    embedding: new StubEmbeddingProvider({
      [EVIDENCE_TEXT]: towards(0, 0.9, 1, 3),
      "Python leadership": basis(0, 3),
      Kubernetes: basis(2, 3),
    }),
    completion: new MockCompletionProvider(),
  };
}

describe("runTailor", () => {
  let dir: string;
  let config: AppConfig;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);

    dir = mkdtempSync(join(tmpdir(), "evidence-tailor-run-"));
    writeFileSync(join(dir, "profile.json"), JSON.stringify(profileJson));
    writeFileSync(join(dir, "backend-lead.json"), JSON.stringify(jobJson));

    config = {
      provider: "mock",
      openaiApiKey: null,
      openaiBaseUrl: "http://localhost:1",
      embeddingModel: "test-embedding",
      completionModel: "test-completion",
      capabilityTimeoutMs: 1000,
      maxBulletsPerRole: 5,
      dbPath: null,
      logLevel: "info",
    };
  });

  afterEach(() => {
    closeDb();
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  const args = (generate: boolean) => ({
    profilePath: join(dir, "profile.json"),
    jobPath: join(dir, "backend-lead.json"),
    jobId: "backend-lead",
    generate,
  });

  it("should compute coverage only when generation is off", async () => {
    const result = await runTailor(args(false), config, providers());

    expect(result.coverage.coverage_map.job_id).toBe("backend-lead");
    expect(result.coverage.coverage_map.profile_id).toBe("profile-7");
    expect(result.coverage.coverage_map.covered_requirements).toEqual(["Python leadership"]);
    expect(result.coverage.coverage_map.gap_requirements).toEqual(["Kubernetes"]);
    expect(result.generation).toBeNull();
    expect(result.draftId).toBeNull();
    expect(result.coverageMapId).toBeNull();
  });

  it("should generate verified bullets", async () => {
    const result = await runTailor(args(true), config, providers());

    expect(result.draftId).not.toBeNull();
    expect(result.generation?.proposed_bullets.map((b) => b.text)).toEqual([EVIDENCE_TEXT]);
    expect(result.generation?.proposed_bullets[0].recommendation).toBe("accept");
  });

  it("should persist the run when a database path is configured", async () => {
    const dbPath = join(dir, "runs.db");
    const result = await runTailor(args(true), { ...config, dbPath }, providers());

    expect(result.coverageMapId).toBe(1);

    openDb(dbPath);
    const stored = getCoverageMap(1);
    expect(stored?.coverageMap.job_id).toBe("backend-lead");
    expect(stored?.embeddingProvider).toBe("stub-embedding");
    expect(listBulletsForCoverageMap(1).map((b) => b.text)).toEqual([EVIDENCE_TEXT]);
  });

  it("should fail on an invalid job description", async () => {
    writeFileSync(join(dir, "backend-lead.json"), JSON.stringify({ title: "" }));

    await expect(runTailor(args(false), config, providers())).rejects.toThrow(
      "job_description.title cannot be empty or whitespace-only",
    );
  });
});
