import type { ChangelogEvent } from "../changelog/runner.js";
import type { FetchEvent } from "../repo/fetch.js";
import type { OperationOutcome, RunSummary } from "./summary.js";

export type LineLevel = "info" | "success" | "warn" | "error" | "verbose";

export interface RenderedLine {
  level: LineLevel;
  message: string;
}

export function formatOutcome(outcome: OperationOutcome): RenderedLine {
  switch (outcome.status) {
    case "success":
      return {
        level: "success",
        message: `${outcome.name}: done${outcome.detail ? ` (${outcome.detail})` : ""}`
      };
    case "skipped":
      return { level: "warn", message: `${outcome.name}: skipped, ${outcome.reason}` };
    case "failed":
      return {
        level: "error",
        message: `${outcome.name}: failed, ${outcome.reason}${outcome.error ? ` (${outcome.error})` : ""}`
      };
  }
}

export function formatFetchEvent(event: FetchEvent): RenderedLine[] {
  switch (event.type) {
    case "repo:start":
      return [
        { level: "info", message: `[${event.index + 1}/${event.total}] ${event.mode === "full" ? "Cloning" : "Sparse-cloning"} ${event.name}` },
        { level: "verbose", message: `Remote: ${event.identifier}` }
      ];
    case "repo:retry":
      return [
        {
          level: "warn",
          message: `${event.name}: ${event.step} attempt ${event.attempt} failed, retrying (attempt ${event.nextAttempt}): ${event.error}`
        }
      ];
    case "repo:outcome":
      return [formatOutcome(event.outcome)];
  }
}

export function formatChangelogEvent(event: ChangelogEvent): RenderedLine[] {
  switch (event.type) {
    case "generator:ready":
      return [{ level: "success", message: `${event.command} found: ${event.version}` }];
    case "repo:start":
      return [
        { level: "info", message: `[${event.index + 1}/${event.total}] Generating changelog for ${event.name}` },
        { level: "verbose", message: `Path: ${event.path}` }
      ];
    case "repo:lines":
      return [{ level: "verbose", message: `${event.name}: ${event.file} contains ${event.lines} lines` }];
    case "repo:outcome":
      return [formatOutcome(event.outcome)];
  }
}

export function renderSummary(title: string, summary: RunSummary): RenderedLine[] {
  const lines: RenderedLine[] = [
    { level: "info", message: `=== ${title} ===` },
    { level: "info", message: `Total: ${summary.total}` },
    { level: "success", message: `Succeeded: ${summary.succeeded}` },
    { level: summary.skipped > 0 ? "warn" : "info", message: `Skipped: ${summary.skipped}` },
    { level: summary.failed > 0 ? "error" : "info", message: `Failed: ${summary.failed}` }
  ];

  if (summary.total === 0) {
    lines.push({ level: "warn", message: "No repositories processed." });
  } else if (summary.succeeded === summary.total) {
    lines.push({ level: "success", message: "All repositories processed successfully." });
  }

  return lines;
}

export function listCancelled(outcomes: readonly OperationOutcome[]): string[] {
  return outcomes
    .filter((outcome) => outcome.status === "skipped" && outcome.reason === "cancelled")
    .map((outcome) => outcome.name);
}
