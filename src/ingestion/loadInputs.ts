/**
 * Input file loading
 *
 * Reads profile and job description JSON files and validates them.
 */

import * as fs from "fs";
import type { ExtractedJD, Profile } from "@/types";
import { InvalidInputError, errorMessage } from "@/errors";
import { validateExtractedJD, validateProfile } from "./inputValidation";

function readJsonFile(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new InvalidInputError(`Cannot read ${filePath}: ${errorMessage(err)}`);
  }

  try {
    return JSON.parse(content);
  } catch (err) {
    throw new InvalidInputError(`${filePath} is not valid JSON: ${errorMessage(err)}`);
  }
}

/**
 * @throws {InvalidInputError} Unreadable file, malformed JSON or invalid profile
 */
export function loadProfile(filePath: string): Profile {
  return validateProfile(readJsonFile(filePath));
}

/**
 * @throws {InvalidInputError} Unreadable file, malformed JSON or invalid job description
 */
export function loadJobDescription(filePath: string): ExtractedJD {
  return validateExtractedJD(readJsonFile(filePath));
}
