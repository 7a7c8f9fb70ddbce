/**
 * Small builders for domain objects used across tests
 */

import type {
  EvidenceSpan,
  ExtractedJD,
  Profile,
  Requirement,
} from "@/types";

export function makeRequirement(
  text: string,
  overrides: Partial<Requirement> = {},
): Requirement {
  return {
    text,
    category: "technical",
    priority: "must_have",
    keywords: [],
    ...overrides,
  };
}

export function makeSpan(
  id: string,
  text: string,
  overrides: Partial<EvidenceSpan> = {},
): EvidenceSpan {
  return {
    id,
    source_type: "experience",
    source_id: "exp-1",
    text,
    ...overrides,
  };
}

export function makeProfile(overrides: Partial<Profile> = {}): Profile {
  return {
    id: "profile-1",
    experiences: [],
    projects: [],
    education: [],
    certifications: [],
    ...overrides,
  };
}

export function makeJobDescription(overrides: Partial<ExtractedJD> = {}): ExtractedJD {
  return {
    title: "Backend Engineer",
    must_have_requirements: [],
    nice_to_have_requirements: [],
    raw_text: "",
    ...overrides,
  };
}
