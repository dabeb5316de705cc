import { EnvpinError } from "../errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  PIPELINE_FAILED: 1,
  UNRESOLVABLE: 2,
  INVALID_INPUT: 3,
  INTEGRITY_FAILED: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(err: unknown): ExitCode {
  if (!(err instanceof EnvpinError)) return EXIT.PIPELINE_FAILED;
  switch (err.code) {
    case "NOT_FOUND":
    case "CONFLICT":
      return EXIT.UNRESOLVABLE;
    case "PARSE_FAILED":
      return EXIT.INVALID_INPUT;
    case "INTEGRITY_MISMATCH":
      return EXIT.INTEGRITY_FAILED;
    default:
      return EXIT.PIPELINE_FAILED;
  }
}
