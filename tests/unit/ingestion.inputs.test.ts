import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  loadJobDescription,
  loadProfile,
  validateExtractedJD,
  validateProfile,
} from "@/ingestion";
import { InvalidInputError } from "@/errors";

describe("validateProfile", () => {
  it("should default missing collections to empty", () => {
    expect(validateProfile({ id: "p-1", full_name: "Test Person" })).toEqual({
      id: "p-1",
      full_name: "Test Person",
      experiences: [],
      projects: [],
      education: [],
      certifications: [],
    });
  });

  it("should default per-entry lists", () => {
    const profile = validateProfile({
      id: "p-1",
      experiences: [{ id: "exp-1", company: "Acme", title: "Engineer" }],
    });
    expect(profile.experiences[0]).toEqual({
      id: "exp-1",
      company: "Acme",
      title: "Engineer",
      bullets: [],
      evidence_ids: [],
    });
  });

  it("should name the invalid field", () => {
    expect(() =>
      validateProfile({ id: "p-1", experiences: [{ id: "exp-1", company: 3, title: "x" }] }),
    ).toThrow("profile.experiences[0].company must be a string, got number");
  });

  it("should reject a blank id", () => {
    expect(() => validateProfile({ id: "  " })).toThrow(
      "profile.id cannot be empty or whitespace-only",
    );
  });

  it("should reject non-objects", () => {
    expect(() => validateProfile([])).toThrow(InvalidInputError);
  });
});

describe("validateExtractedJD", () => {
  it("should take a missing priority from the list", () => {
    const jd = validateExtractedJD({
      title: "Backend Engineer",
      must_have_requirements: [{ text: "Python", category: "technical" }],
      nice_to_have_requirements: [
        { text: "GraphQL", category: "technical", priority: "nice_to_have", keywords: ["graphql"] },
      ],
    });

    expect(jd.must_have_requirements).toEqual([
      { text: "Python", category: "technical", priority: "must_have", keywords: [] },
    ]);
    expect(jd.nice_to_have_requirements[0].keywords).toEqual(["graphql"]);
    expect(jd.raw_text).toBe("");
  });

  it("should reject a priority that contradicts its list", () => {
    expect(() =>
      validateExtractedJD({
        title: "Backend Engineer",
        must_have_requirements: [
          { text: "Python", category: "technical", priority: "nice_to_have" },
        ],
      }),
    ).toThrow(
      'job_description.must_have_requirements[0].priority is "nice_to_have" inside the must_have list',
    );
  });

  it("should reject unknown categories", () => {
    expect(() =>
      validateExtractedJD({
        title: "Backend Engineer",
        must_have_requirements: [{ text: "Python", category: "language" }],
      }),
    ).toThrow(InvalidInputError);
  });

  it("should accept null company and location", () => {
    const jd = validateExtractedJD({ title: "Engineer", company: null, location: null });
    expect(jd.company).toBeNull();
    expect(jd.location).toBeNull();
  });
});

describe("loadProfile / loadJobDescription", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  function writeTemp(name: string, content: string): string {
    dir = dir ?? mkdtempSync(join(tmpdir(), "evidence-tailor-inputs-"));
    const filePath = join(dir, name);
    writeFileSync(filePath, content, "utf-8");
    return filePath;
  }

  it("should load valid files", () => {
    expect(loadProfile(writeTemp("profile.json", '{"id":"p-1"}')).id).toBe("p-1");
    expect(loadJobDescription(writeTemp("job.json", '{"title":"Engineer"}')).title).toBe(
      "Engineer",
    );
  });

  it("should report malformed JSON as invalid input", () => {
    expect(() => loadProfile(writeTemp("bad.json", "{"))).toThrow(InvalidInputError);
  });

  it("should report missing files as invalid input", () => {
    expect(() => loadProfile("/nonexistent/profile.json")).toThrow(
      /^Cannot read \/nonexistent\/profile\.json/,
    );
  });
});
