import { errorCodeOf } from "./crawlErrors";

export const ExitCode = {
  Ok: 0,
  Fatal: 1,
  InvalidCaseNumber: 2,
  ChallengeFailed: 3,
  RateLimited: 4,
  CaseUnavailable: 5,
  Interrupted: 130,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(error: unknown): ExitCodeValue {
  switch (errorCodeOf(error)) {
    case "InvalidCaseNumber":
      return ExitCode.InvalidCaseNumber;
    case "ChallengeFailed":
      return ExitCode.ChallengeFailed;
    case "RateLimited":
      return ExitCode.RateLimited;
    case "NotFound":
    case "AmbiguousResult":
      return ExitCode.CaseUnavailable;
    default:
      return ExitCode.Fatal;
  }
}
