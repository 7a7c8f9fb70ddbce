/**
 * Bullet generation orchestrator
 *
 * For each covered requirement (in priority order): top evidence ->
 * prompt -> completion -> AMOT verification -> ProvenanceBullet.
 * Requirements are processed one at a time.
 */

import { randomUUID } from "crypto";
import type {
  BulletGenerationResult,
  CompletionProvider,
  CoverageMap,
  EvidenceSpan,
  GenerationOptions,
  Profile,
  ProvenanceBullet,
  RequirementCoverage,
} from "@/types";
import {
  DEFAULT_CAPABILITY_TIMEOUT_MS,
  DEFAULT_MAX_BULLETS_PER_ROLE,
  DEFAULT_TOP_EVIDENCE_PER_REQUIREMENT,
  GENERATION_MAX_TOKENS,
  GENERATION_SYSTEM_PROMPT,
  GENERATION_TEMPERATURE,
  LOG_TEXT_PREVIEW_LENGTH,
} from "@/constants";
import { InvalidInputError, NoEvidenceError, errorMessage } from "@/errors";
import { withTimeout } from "@/providers/withTimeout";
import { getPrioritizedRequirements, getTopEvidence } from "@/coverage/queries";
import { extractEvidence } from "@/evidence";
import type { VerificationService } from "@/verification";
import type { DraftStore } from "@/store";
import * as logger from "@/logger";
import { buildGenerationPrompt } from "./prompts";

export type BulletGeneratorDeps = {
  completion: CompletionProvider;
  verification: VerificationService;
  /** Where bullets go when GenerationOptions.draftId is set */
  draftStore?: DraftStore;
  timeoutMs?: number;
};

export class BulletGenerator {
  private readonly completion: CompletionProvider;
  private readonly verification: VerificationService;
  private readonly draftStore: DraftStore | undefined;
  private readonly timeoutMs: number;

  constructor(deps: BulletGeneratorDeps) {
    this.completion = deps.completion;
    this.verification = deps.verification;
    this.draftStore = deps.draftStore;
    this.timeoutMs = deps.timeoutMs ?? DEFAULT_CAPABILITY_TIMEOUT_MS;
  }

  /**
   * Generate verified bullets for the covered requirements of a map.
   *
   * @throws {NoEvidenceError} No requirement in the map is covered
   * @throws {InvalidInputError} draftId given without a draft store, or unknown draft
   */
  async generateWithProvenance(
    coverageMap: CoverageMap,
    profile: Profile,
    options: GenerationOptions = {},
  ): Promise<BulletGenerationResult> {
    const started = Date.now();
    const maxBullets = options.maxBulletsPerRole ?? DEFAULT_MAX_BULLETS_PER_ROLE;
    const log = logger.withContext({ jobId: coverageMap.job_id, profileId: profile.id });

    if (options.draftId !== undefined) {
      if (!this.draftStore) {
        throw new InvalidInputError("draftId given but no draft store configured");
      }
      if (!this.draftStore.get(options.draftId)) {
        throw new InvalidInputError(`Draft ${options.draftId} not found`);
      }
    }

    const covered = getPrioritizedRequirements(coverageMap).filter((rc) => rc.is_covered);
    if (covered.length === 0) {
      throw new NoEvidenceError();
    }

    const selected = covered.slice(0, maxBullets);
    const evidence = extractEvidence(profile);

    log.info("Generating bullets", {
      covered: covered.length,
      selected: selected.length,
      provider: this.completion.name,
    });

    const proposed: ProvenanceBullet[] = [];
    const suggested: ProvenanceBullet[] = [];
    let failed = 0;

    for (const requirement of selected) {
      let bullet: ProvenanceBullet;
      try {
        bullet = await this.generateOne(requirement, evidence);
      } catch (err) {
        failed++;
        log.error("Bullet generation failed", {
          requirement: logger.preview(requirement.requirement_text, LOG_TEXT_PREVIEW_LENGTH),
          error: errorMessage(err),
        });
        continue;
      }

      if (options.requireFullVerification && !bullet.is_verified) {
        log.debug("Skipping partially verified bullet", {
          requirement: logger.preview(requirement.requirement_text, LOG_TEXT_PREVIEW_LENGTH),
          rate: bullet.verification_rate,
        });
        continue;
      }

      if (bullet.status === "proposed") {
        proposed.push(bullet);
      } else {
        suggested.push(bullet);
      }
    }

    if (options.draftId !== undefined && this.draftStore) {
      this.draftStore.upsertBullets(options.draftId, [...proposed, ...suggested]);
    }

    const result: BulletGenerationResult = {
      proposed_bullets: proposed,
      suggested_edits: suggested,
      metadata: {
        total_generated: proposed.length + suggested.length,
        proposed_count: proposed.length,
        suggested_edit_count: suggested.length,
        generation_time_ms: Date.now() - started,
        requirements_processed: selected.length,
        requirements_skipped: covered.length - selected.length,
        requirements_failed: failed,
      },
    };

    log.info("Bullet generation complete", {
      proposed: proposed.length,
      suggested: suggested.length,
      failed,
    });
    return result;
  }

  private async generateOne(
    requirement: RequirementCoverage,
    evidence: EvidenceSpan[],
  ): Promise<ProvenanceBullet> {
    const top = getTopEvidence(requirement, DEFAULT_TOP_EVIDENCE_PER_REQUIREMENT);
    const prompt = buildGenerationPrompt(requirement.requirement_text, top);

    const reply = await withTimeout("completion", this.timeoutMs, () =>
      this.completion.complete({
        prompt,
        system: GENERATION_SYSTEM_PROMPT,
        maxTokens: GENERATION_MAX_TOKENS,
        temperature: GENERATION_TEMPERATURE,
      }),
    );
    const text = reply.trim();
    if (text.length === 0) {
      throw new InvalidInputError("Completion returned an empty bullet");
    }

    const claimedIds = top.map((ev) => ev.evidence_id);
    const verification = await this.verification.verifyBullet(text, evidence, claimedIds);
    const amot = verification.amot_components;

    return {
      id: randomUUID(),
      text,
      requirement_text: requirement.requirement_text,
      evidence_ids: claimedIds,
      evidence_texts: top.map((ev) => ev.evidence_text),
      similarity_scores: top.map((ev) => ev.similarity_score),
      action: amot.action,
      metric: amot.metric,
      outcome: amot.outcome,
      tool: amot.tool,
      verification,
      is_verified: verification.is_fully_verified,
      verification_rate: verification.overall_verification_rate,
      status: verification.is_acceptable ? "proposed" : "suggested_edit",
      recommendation: verification.recommendation,
      generated_by: this.completion.name,
      generated_at: new Date().toISOString(),
    };
  }
}
