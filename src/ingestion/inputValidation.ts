/**
 * Profile and job description validation
 *
 * Fail-fast: throws InvalidInputError on the first problem, naming the
 * field path. Optional collections default to empty.
 */

import type {
  Certification,
  Education,
  Experience,
  ExtractedJD,
  Profile,
  Project,
  Requirement,
  RequirementPriority,
} from "@/types";
import { REQUIREMENT_CATEGORIES, REQUIREMENT_PRIORITIES } from "@/constants";
import { InvalidInputError } from "@/errors";
import {
  type JsonRecord,
  expectRecord,
  readEnum,
  readList,
  readString,
  readStringArray,
} from "@/utils";

function fail(message: string): never {
  throw new InvalidInputError(message);
}

/**
 * Read an optional array field, defaulting to []
 */
function optionalList<T>(
  rec: JsonRecord,
  key: string,
  path: string,
  readItem: (item: JsonRecord, itemPath: string) => T,
): T[] {
  return rec[key] === undefined ? [] : readList(rec, key, path, fail, readItem);
}

function optionalStrings(rec: JsonRecord, key: string, path: string): string[] {
  return rec[key] === undefined ? [] : readStringArray(rec, key, path, fail);
}

function optionalNullableString(
  rec: JsonRecord,
  key: string,
  path: string,
): string | null | undefined {
  const value = rec[key];
  if (value === undefined || value === null) return value;
  return readString(rec, key, path, fail);
}

function readExperience(rec: JsonRecord, path: string): Experience {
  return {
    id: readString(rec, "id", path, fail, { nonEmpty: true }),
    company: readString(rec, "company", path, fail),
    title: readString(rec, "title", path, fail),
    bullets: optionalStrings(rec, "bullets", path),
    evidence_ids: optionalStrings(rec, "evidence_ids", path),
  };
}

function readProject(rec: JsonRecord, path: string): Project {
  const project: Project = {
    id: readString(rec, "id", path, fail, { nonEmpty: true }),
    name: readString(rec, "name", path, fail),
    description: rec.description === undefined ? "" : readString(rec, "description", path, fail),
    achievements: optionalStrings(rec, "achievements", path),
    evidence_ids: optionalStrings(rec, "evidence_ids", path),
  };
  if (rec.technologies !== undefined) {
    project.technologies = readStringArray(rec, "technologies", path, fail);
  }
  return project;
}

function readEducation(rec: JsonRecord, path: string): Education {
  return {
    id: readString(rec, "id", path, fail, { nonEmpty: true }),
    institution: readString(rec, "institution", path, fail),
    degree: readString(rec, "degree", path, fail),
    relevant_coursework: optionalStrings(rec, "relevant_coursework", path),
  };
}

function readCertification(rec: JsonRecord, path: string): Certification {
  return {
    id: readString(rec, "id", path, fail, { nonEmpty: true }),
    name: readString(rec, "name", path, fail, { nonEmpty: true }),
    issuer: readString(rec, "issuer", path, fail),
  };
}

/**
 * @throws {InvalidInputError} If the value is not a valid profile
 */
export function validateProfile(raw: unknown): Profile {
  const path = "profile";
  const rec = expectRecord(raw, path, fail);

  const profile: Profile = {
    id: readString(rec, "id", path, fail, { nonEmpty: true }),
    experiences: optionalList(rec, "experiences", path, readExperience),
    projects: optionalList(rec, "projects", path, readProject),
    education: optionalList(rec, "education", path, readEducation),
    certifications: optionalList(rec, "certifications", path, readCertification),
  };
  if (rec.full_name !== undefined) {
    profile.full_name = readString(rec, "full_name", path, fail);
  }
  return profile;
}

/**
 * Requirement reader for one priority list; a missing priority is taken
 * from the list, a conflicting one is an error.
 */
function requirementReader(listPriority: RequirementPriority) {
  return (rec: JsonRecord, path: string): Requirement => {
    const priority =
      rec.priority === undefined
        ? listPriority
        : readEnum(rec, "priority", REQUIREMENT_PRIORITIES, path, fail);
    if (priority !== listPriority) {
      fail(`${path}.priority is "${priority}" inside the ${listPriority} list`);
    }
    return {
      text: readString(rec, "text", path, fail, { nonEmpty: true }),
      category: readEnum(rec, "category", REQUIREMENT_CATEGORIES, path, fail),
      priority,
      keywords: optionalStrings(rec, "keywords", path),
    };
  };
}

/**
 * @throws {InvalidInputError} If the value is not a valid job description
 */
export function validateExtractedJD(raw: unknown): ExtractedJD {
  const path = "job_description";
  const rec = expectRecord(raw, path, fail);

  const jd: ExtractedJD = {
    title: readString(rec, "title", path, fail, { nonEmpty: true }),
    company: optionalNullableString(rec, "company", path),
    location: optionalNullableString(rec, "location", path),
    must_have_requirements: optionalList(
      rec,
      "must_have_requirements",
      path,
      requirementReader("must_have"),
    ),
    nice_to_have_requirements: optionalList(
      rec,
      "nice_to_have_requirements",
      path,
      requirementReader("nice_to_have"),
    ),
    raw_text: rec.raw_text === undefined ? "" : readString(rec, "raw_text", path, fail),
  };
  if (rec.required_keywords !== undefined) {
    jd.required_keywords = readStringArray(rec, "required_keywords", path, fail);
  }
  return jd;
}
