/**
 * CLI argument parsing
 */

import { basename, extname } from "path";
import { parseArgs } from "util";
import { InvalidInputError, errorMessage } from "@/errors";

export const USAGE =
  "Usage: evidence-tailor <profile.json> <job.json> [--job-id <id>] [--generate]";

export type CliArgs = {
  profilePath: string;
  jobPath: string;
  /** Defaults to the job file name without extension */
  jobId: string;
  generate: boolean;
};

/**
 * @throws {InvalidInputError} Unknown options or missing positionals
 */
export function parseCliArgs(argv: string[]): CliArgs {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (err) {
    throw new InvalidInputError(`${errorMessage(err)}\n${USAGE}`);
  }

  const [profilePath, jobPath, ...extra] = parsed.positionals;
  if (!profilePath || !jobPath || extra.length > 0) {
    throw new InvalidInputError(USAGE);
  }

  return {
    profilePath,
    jobPath,
    jobId: parsed.values["job-id"] ?? basename(jobPath, extname(jobPath)),
    generate: parsed.values.generate ?? false,
  };
}

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      "job-id": { type: "string" },
      generate: { type: "boolean" },
    },
  });
}
