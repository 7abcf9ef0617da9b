import type { PipelineOutcome } from "./core/pipeline";

export const ExitCode = {
  Ok: 0,
  Failure: 1,
  InvalidConfig: 2,
  QueueUnavailable: 3,
  SourceUnavailable: 4
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(outcome: PipelineOutcome): ExitCode {
  switch (outcome) {
    case "queue_unavailable":
      return ExitCode.QueueUnavailable;
    case "source_unavailable":
      return ExitCode.SourceUnavailable;
    case "stopped":
    case "source_ended":
      return ExitCode.Ok;
  }
}
