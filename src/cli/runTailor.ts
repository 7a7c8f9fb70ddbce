/**
 * One tailoring run: load inputs, map coverage, optionally generate
 * bullets, optionally persist.
 */

import type {
  AppConfig,
  BulletGenerationResult,
  CoverageMapResult,
  ProviderBundle,
} from "@/types";
import { CoverageMappingService } from "@/coverage";
import { VerificationService } from "@/verification";
import { BulletGenerator, getAllBullets } from "@/generation";
import { DraftStore } from "@/store";
import { loadJobDescription, loadProfile } from "@/ingestion";
import {
  applyMigrations,
  closeDb,
  openDb,
  saveCoverageRun,
} from "@/db";
import * as logger from "@/logger";
import type { CliArgs } from "./parseArgs";

export type TailorRunResult = {
  coverage: CoverageMapResult;
  generation: BulletGenerationResult | null;
  draftId: string | null;
  /** Row id when persisted (DB_PATH set) */
  coverageMapId: number | null;
};

export async function runTailor(
  args: CliArgs,
  config: AppConfig,
  providers: ProviderBundle,
): Promise<TailorRunResult> {
  const profile = loadProfile(args.profilePath);
  const jd = loadJobDescription(args.jobPath);

  const coverageService = new CoverageMappingService(providers.embedding, {
    timeoutMs: config.capabilityTimeoutMs,
  });
  const coverage = await coverageService.computeCoverageMap(jd, profile, args.jobId);
  const map = coverage.coverage_map;

  logger.info("Coverage summary", {
    jobId: map.job_id,
    overall: map.overall_coverage_score,
    mustHave: map.must_have_coverage_score,
    niceToHave: map.nice_to_have_coverage_score,
    covered: map.covered_requirements.length,
    gaps: map.gap_requirements.length,
  });
  for (const gap of map.critical_gaps) {
    logger.warn("Critical gap", {
      requirement: gap.requirement_text,
      bestScore: gap.best_match_score,
    });
  }

  let generation: BulletGenerationResult | null = null;
  let draftId: string | null = null;
  if (args.generate) {
    const drafts = new DraftStore();
    draftId = drafts.create(args.jobId, profile.id).id;
    const generator = new BulletGenerator({
      completion: providers.completion,
      verification: new VerificationService(providers.completion, {
        timeoutMs: config.capabilityTimeoutMs,
      }),
      draftStore: drafts,
      timeoutMs: config.capabilityTimeoutMs,
    });
    generation = await generator.generateWithProvenance(map, profile, {
      maxBulletsPerRole: config.maxBulletsPerRole,
      draftId,
    });
  }

  let coverageMapId: number | null = null;
  if (config.dbPath) {
    const db = openDb(config.dbPath);
    try {
      applyMigrations(db);
      const id = saveCoverageRun(
        map,
        coverage.embedding_provider,
        generation ? getAllBullets(generation) : [],
      );
      coverageMapId = id;
      logger.info("Results persisted", { coverageMapId: id, dbPath: config.dbPath });
    } finally {
      closeDb();
    }
  }

  return { coverage, generation, draftId, coverageMapId };
}
