/**
 * Candidate profile and evidence type definitions
 *
 * Every piece of candidate history that can back a claim is exposed as an
 * EvidenceSpan with a stable id, so generated bullets can be traced back
 * to their origin.
 */

export type Experience = {
  id: string;
  company: string;
  title: string;
  bullets: string[];
  /** One evidence id per bullet (positional); missing ids are derived */
  evidence_ids: string[];
};

export type Project = {
  id: string;
  name: string;
  description: string;
  achievements: string[];
  evidence_ids: string[];
  technologies?: string[];
};

export type Education = {
  id: string;
  institution: string;
  degree: string;
  relevant_coursework: string[];
};

export type Certification = {
  id: string;
  name: string;
  issuer: string;
};

export type Profile = {
  id: string;
  full_name?: string;
  experiences: Experience[];
  projects: Project[];
  education: Education[];
  certifications: Certification[];
};

export type EvidenceSourceType =
  | "experience"
  | "education"
  | "project"
  | "certification";

/**
 * Atomic, attributable piece of candidate history.
 *
 * Never mutated after extraction. Embeddings are attached by returning a
 * new span, not by writing to an existing one.
 */
export type EvidenceSpan = {
  /** Stable unique identifier */
  id: string;
  source_type: EvidenceSourceType;
  /** Id of the parent entity (experience, project, ...) */
  source_id: string;
  text: string;
  category?: string;
  embedding?: number[];
};
