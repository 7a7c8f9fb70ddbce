/**
 * Coverage mapping service
 *
 * Composes evidence extraction, embedding, similarity, analysis and
 * aggregation into one CoverageMapResult per (job, profile).
 */

import type {
  CoverageMapResult,
  CoverageThresholds,
  EmbeddingProvider,
  EvidenceSpan,
  ExtractedJD,
  Profile,
  Requirement,
} from "@/types";
import {
  DEFAULT_CAPABILITY_TIMEOUT_MS,
  DEFAULT_COVERAGE_THRESHOLDS,
} from "@/constants";
import { EmbeddingError, InvalidInputError, errorMessage } from "@/errors";
import { withTimeout } from "@/providers/withTimeout";
import { extractEvidence } from "@/evidence";
import * as logger from "@/logger";
import { computeSimilarityMatrix } from "./similarity";
import { analyzeRequirementCoverage } from "./analyzer";
import { buildCoverageMap } from "./aggregator";

export type CoverageMappingServiceOptions = {
  timeoutMs?: number;
  thresholds?: CoverageThresholds;
};

/**
 * Must-haves first, then nice-to-haves, each in JD order
 */
export function getAllRequirements(jd: ExtractedJD): Requirement[] {
  return [...jd.must_have_requirements, ...jd.nice_to_have_requirements];
}

export class CoverageMappingService {
  private readonly timeoutMs: number;
  private readonly thresholds: CoverageThresholds;

  constructor(
    private readonly embedding: EmbeddingProvider,
    options: CoverageMappingServiceOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CAPABILITY_TIMEOUT_MS;
    this.thresholds = options.thresholds ?? DEFAULT_COVERAGE_THRESHOLDS;
  }

  /**
   * Compute the coverage map of a profile against a job description.
   *
   * @throws {InvalidInputError} No requirements or no evidence
   * @throws {EmbeddingError} Embedding call failed, timed out or returned bad vectors
   */
  async computeCoverageMap(
    jd: ExtractedJD,
    profile: Profile,
    jobId: string,
  ): Promise<CoverageMapResult> {
    return this.computeCoverage(getAllRequirements(jd), extractEvidence(profile), {
      jobId,
      profileId: profile.id,
    });
  }

  /**
   * Same as computeCoverageMap, over pre-extracted requirements and evidence
   */
  async computeCoverage(
    requirements: Requirement[],
    evidence: EvidenceSpan[],
    ids: { jobId: string; profileId: string },
  ): Promise<CoverageMapResult> {
    const log = logger.withContext({ jobId: ids.jobId, profileId: ids.profileId });
    const started = Date.now();

    if (requirements.length === 0) {
      throw new InvalidInputError("Job description has no requirements");
    }
    if (evidence.length === 0) {
      throw new InvalidInputError(`Profile ${ids.profileId} has no evidence`);
    }

    log.info("Computing coverage map", {
      requirements: requirements.length,
      evidence: evidence.length,
      provider: this.embedding.name,
    });

    const evidenceEmbeddings = await this.embedBatch(
      evidence.map((ev) => ev.text),
      "evidence",
    );
    const requirementEmbeddings = await this.embedBatch(
      requirements.map((req) => req.text),
      "requirement",
    );

    const matrix = computeSimilarityMatrix(requirementEmbeddings, evidenceEmbeddings);
    const requirementCoverage = analyzeRequirementCoverage(
      requirements,
      evidence,
      matrix,
      this.thresholds,
    );
    const coverageMap = buildCoverageMap({
      jobId: ids.jobId,
      profileId: ids.profileId,
      requirementCoverage,
      evidence,
      matrix,
      thresholds: this.thresholds,
    });

    const executionTimeMs = Date.now() - started;
    log.info("Coverage map computed", {
      overall: coverageMap.overall_coverage_score,
      mustHave: coverageMap.must_have_coverage_score,
      criticalGaps: coverageMap.critical_gaps.length,
      executionTimeMs,
    });

    return {
      coverage_map: coverageMap,
      execution_time_ms: executionTimeMs,
      embedding_provider: this.embedding.name,
      total_evidence_items: evidence.length,
      total_requirements: requirements.length,
    };
  }

  private async embedBatch(texts: string[], label: string): Promise<number[][]> {
    let vectors: number[][];
    try {
      vectors = await withTimeout("embedding", this.timeoutMs, () =>
        this.embedding.embed(texts),
      );
    } catch (err) {
      if (err instanceof EmbeddingError) throw err;
      throw new EmbeddingError(
        `Failed to embed ${label} texts: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    if (vectors.length !== texts.length) {
      throw new EmbeddingError(
        `Embedding provider returned ${vectors.length} vectors for ${texts.length} ${label} texts`,
      );
    }
    return vectors;
  }
}
