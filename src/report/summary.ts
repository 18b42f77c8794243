export type OperationOutcome =
  | { status: "success"; name: string; path: string; detail?: string }
  | { status: "skipped"; name: string; path: string; reason: string }
  | { status: "failed"; name: string; path: string; reason: string; error?: string };

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

export interface RunReport {
  outcomes: OperationOutcome[];
  summary: RunSummary;
}

export function summarizeOutcomes(outcomes: readonly OperationOutcome[]): RunSummary {
  return outcomes.reduce<RunSummary>(
    (summary, outcome) => ({
      total: summary.total + 1,
      succeeded: summary.succeeded + (outcome.status === "success" ? 1 : 0),
      failed: summary.failed + (outcome.status === "failed" ? 1 : 0),
      skipped: summary.skipped + (outcome.status === "skipped" ? 1 : 0)
    }),
    { total: 0, succeeded: 0, failed: 0, skipped: 0 }
  );
}

export function exitCodeFor(summary: RunSummary): number {
  return summary.failed === 0 ? 0 : 1;
}

export function toRunReport(outcomes: OperationOutcome[]): RunReport {
  return {
    outcomes,
    summary: summarizeOutcomes(outcomes)
  };
}
