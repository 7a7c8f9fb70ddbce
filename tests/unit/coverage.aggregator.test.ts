import { describe, it, expect } from "vitest";
import { analyzeRequirementCoverage } from "@/coverage/analyzer";
import { buildCoverageMap, overallCoverageScore } from "@/coverage/aggregator";
import type {
  Requirement,
  RequirementCoverage,
  RequirementPriority,
  SimilarityMatrix,
} from "@/types";
import { makeRequirement, makeSpan } from "../helpers/fixtures";

function mapFor(requirements: Requirement[], matrix: SimilarityMatrix, evidenceCount: number) {
  const evidence = Array.from({ length: evidenceCount }, (_, j) =>
    makeSpan(`ev-${j + 1}`, `evidence ${j + 1}`),
  );
  const requirementCoverage = analyzeRequirementCoverage(requirements, evidence, matrix);
  return buildCoverageMap({
    jobId: "job-1",
    profileId: "profile-1",
    requirementCoverage,
    evidence,
    matrix,
  });
}

describe("buildCoverageMap", () => {
  const requirements = [
    makeRequirement("Python"),
    makeRequirement("Kubernetes"),
    makeRequirement("GraphQL", { priority: "nice_to_have" }),
  ];
  const matrix = [
    [0.9, 0.3, 0.6],
    [0.4, 0.7, 0.2],
    [0.2, 0.68, 0.1],
  ];

  it("should compute priority scores and the weighted overall score", () => {
    const map = mapFor(requirements, matrix, 3);

    expect(map.must_have_coverage_score).toBe(0.5);
    expect(map.nice_to_have_coverage_score).toBe(1);
    expect(map.overall_coverage_score).toBeCloseTo(0.65, 10);
  });

  it("should list covered, gap and critical requirements", () => {
    const map = mapFor(requirements, matrix, 3);

    expect(map.covered_requirements).toEqual(["Python", "GraphQL"]);
    expect(map.gap_requirements).toEqual(["Kubernetes"]);
    expect(map.critical_gaps.map((rc) => rc.requirement_text)).toEqual(["Kubernetes"]);
    expect(map.job_id).toBe("job-1");
    expect(map.profile_id).toBe("profile-1");
  });

  it("should rank top evidence by best score and name the best requirement", () => {
    const map = mapFor(requirements, matrix, 3);

    expect(
      map.top_matching_evidence.map((m) => [
        m.evidence_id,
        m.similarity_score,
        m.best_requirement_text,
      ]),
    ).toEqual([
      ["ev-1", 0.9, "Python"],
      ["ev-2", 0.7, "Kubernetes"],
      ["ev-3", 0.6, "Python"],
    ]);
  });

  it("should cap top evidence at 10 and drop weak evidence", () => {
    const scores = [0.95, 0.9, 0.88, 0.86, 0.84, 0.82, 0.8, 0.78, 0.76, 0.74, 0.72, 0.3];
    const map = mapFor([makeRequirement("Python")], [scores], scores.length);

    expect(map.top_matching_evidence).toHaveLength(10);
    expect(map.top_matching_evidence[9].evidence_id).toBe("ev-10");

    const weak = mapFor([makeRequirement("Python")], [[0.3, 0.55, 0.49]], 3);
    expect(weak.top_matching_evidence.map((m) => m.evidence_id)).toEqual(["ev-2"]);
  });

  it("should keep evidence order on equal best scores", () => {
    const map = mapFor([makeRequirement("Python")], [[0.7, 0.7, 0.9]], 3);
    expect(map.top_matching_evidence.map((m) => m.evidence_id)).toEqual([
      "ev-3",
      "ev-1",
      "ev-2",
    ]);
  });
});

describe("overallCoverageScore", () => {
  const covered = mapFor([makeRequirement("A", { priority: "nice_to_have" })], [[0.9]], 1)
    .requirement_coverage;

  it("should use the only non-empty group on its own", () => {
    expect(overallCoverageScore([], covered)).toBe(1);
    expect(overallCoverageScore(covered, [])).toBe(1);
  });

  it("should be 0 without requirements", () => {
    expect(overallCoverageScore([], [])).toBe(0);
  });

  it("should equal both group scores when they are the same", () => {
    const requirements = [
      ...["A", "B", "C", "D"].map((text) => makeRequirement(text)),
      ...["E", "F", "G", "H"].map((text) => makeRequirement(text, { priority: "nice_to_have" })),
    ];
    const matrix = [[0.9], [0.9], [0.9], [0.1], [0.9], [0.9], [0.9], [0.1]];
    const map = mapFor(requirements, matrix, 1);

    expect(map.must_have_coverage_score).toBe(0.75);
    expect(map.nice_to_have_coverage_score).toBe(0.75);
    expect(map.overall_coverage_score).toBe(0.75);
  });

  it("should stay between the must-have and nice-to-have scores", () => {
    // covered / total -> one priority group with that fraction covered
    const groups = (priority: RequirementPriority) => {
      const result: Array<{ score: number; coverage: RequirementCoverage[] }> = [];
      for (let total = 1; total <= 12; total++) {
        for (let covered = 0; covered <= total; covered++) {
          const requirements = Array.from({ length: total }, (_, i) =>
            makeRequirement(`R${i}`, { priority }),
          );
          const matrix = requirements.map((_, i) => [i < covered ? 0.9 : 0.1]);
          const evidence = [makeSpan("ev-1", "evidence 1")];
          result.push({
            score: covered / total,
            coverage: analyzeRequirementCoverage(requirements, evidence, matrix),
          });
        }
      }
      return result;
    };

    const violations: string[] = [];
    for (const must of groups("must_have")) {
      for (const nice of groups("nice_to_have")) {
        const overall = overallCoverageScore(must.coverage, nice.coverage);
        const low = Math.min(must.score, nice.score);
        const high = Math.max(must.score, nice.score);
        if (overall < low || overall > high) {
          violations.push(`must=${must.score} nice=${nice.score} overall=${overall}`);
        }
      }
    }
    expect(violations).toEqual([]);
  });
});
