import type { Dirent, Stats } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import type { LocalRepository } from "../repo/descriptor.js";
import { createGitTransport, type HistoryProbe, type StepResult } from "../repo/transport.js";
import { FleetError, isErrnoException, toErrorMessage } from "../runtime/errors.js";
import { mapWithConcurrency } from "../runtime/pool.js";
import { toRunReport, type OperationOutcome, type RunReport } from "../report/summary.js";
import type { ChangelogGenerator } from "./generator.js";

export type ChangelogEvent =
  | { type: "generator:ready"; command: string; version: string }
  | { type: "repo:start"; index: number; total: number; name: string; path: string }
  | { type: "repo:lines"; name: string; file: string; lines: number }
  | { type: "repo:outcome"; index: number; total: number; outcome: OperationOutcome };

export interface GenerateAllOptions {
  concurrency?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  history?: HistoryProbe;
  onEvent?: (event: ChangelogEvent) => void;
}

export interface GenerateAllResult extends RunReport {
  repositories: LocalRepository[];
}

export interface RepositoryEntry {
  name: string;
  path: string;
  inspectionError?: string;
}

export async function generateAll(
  reposRoot: string,
  outputFileName: string,
  generator: ChangelogGenerator,
  options: GenerateAllOptions = {}
): Promise<GenerateAllResult> {
  const history = options.history ?? createGitTransport();
  const version = await generator.ensureAvailable({ signal: options.signal });
  options.onEvent?.({ type: "generator:ready", command: generator.command, version });

  const entries = await listRepositoryDirectories(reposRoot);
  const total = entries.length;
  const repositories: LocalRepository[] = [];
  const callOptions = { signal: options.signal, timeoutMs: options.timeoutMs };

  const generateOne = async (entry: RepositoryEntry): Promise<OperationOutcome> => {
    const { name, path } = entry;
    if (entry.inspectionError !== undefined) {
      return { status: "failed", name, path, reason: "access error", error: entry.inspectionError };
    }

    let hasCommits: boolean;
    try {
      if (!(await hasGitMetadata(path))) {
        return { status: "skipped", name, path, reason: "not a repository" };
      }
      hasCommits = await history.hasCommits(path, callOptions);
    } catch (error) {
      return { status: "failed", name, path, reason: "access error", error: toErrorMessage(error) };
    }

    repositories.push({ name, path, materialized: true, hasCommitHistory: hasCommits });
    if (!hasCommits) {
      return { status: "skipped", name, path, reason: "no commits" };
    }

    let result: StepResult;
    let lines: number | undefined;
    try {
      result = await generator.generate(path, outputFileName, callOptions);
      lines = result.ok ? await countLines(join(path, outputFileName)) : undefined;
    } catch (error) {
      return { status: "failed", name, path, reason: "generation error", error: toErrorMessage(error) };
    }

    if (!result.ok) {
      return { status: "failed", name, path, reason: "generation error", error: result.message };
    }

    if (lines === undefined) {
      return { status: "success", name, path };
    }

    options.onEvent?.({ type: "repo:lines", name, file: outputFileName, lines });
    return { status: "success", name, path, detail: `${lines} lines` };
  };

  const outcomes = await mapWithConcurrency(
    entries,
    async (entry, index) => {
      options.onEvent?.({ type: "repo:start", index, total, name: entry.name, path: entry.path });
      const outcome = await generateOne(entry);
      options.onEvent?.({ type: "repo:outcome", index, total, outcome });
      return outcome;
    },
    {
      concurrency: options.concurrency ?? 1,
      signal: options.signal,
      onCancelled: (entry): OperationOutcome => ({
        status: "skipped",
        name: entry.name,
        path: entry.path,
        reason: "cancelled"
      })
    }
  );

  const order = new Map(entries.map((entry, index) => [entry.path, index]));
  return {
    ...toRunReport(outcomes),
    repositories: repositories.sort((left, right) => (order.get(left.path) ?? 0) - (order.get(right.path) ?? 0))
  };
}

/** Immediate subdirectories of `root`, sorted by name. Plain files are ignored. */
export async function listRepositoryDirectories(root: string): Promise<RepositoryEntry[]> {
  let rootStats: Stats;
  try {
    rootStats = await stat(root);
  } catch (error) {
    const detail = isErrnoException(error) && error.code === "ENOENT" ? "directory not found" : toErrorMessage(error);
    throw new FleetError("root_unavailable", `Cannot read repositories directory '${root}': ${detail}`, { cause: error });
  }

  if (!rootStats.isDirectory()) {
    throw new FleetError("root_unavailable", `Cannot read repositories directory '${root}': not a directory`);
  }

  let dirents: Dirent[];
  try {
    dirents = await readdir(root, { withFileTypes: true });
  } catch (error) {
    throw new FleetError("root_unavailable", `Cannot read repositories directory '${root}': ${toErrorMessage(error)}`, {
      cause: error
    });
  }

  const entries: RepositoryEntry[] = [];
  for (const dirent of [...dirents].sort((left, right) => compareNames(left.name, right.name))) {
    const path = join(root, dirent.name);
    if (dirent.isDirectory()) {
      entries.push({ name: dirent.name, path });
      continue;
    }

    if (!dirent.isSymbolicLink()) {
      continue;
    }

    try {
      if ((await stat(path)).isDirectory()) {
        entries.push({ name: dirent.name, path });
      }
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        continue;
      }
      entries.push({ name: dirent.name, path, inspectionError: toErrorMessage(error) });
    }
  }

  return entries;
}

async function hasGitMetadata(repoPath: string): Promise<boolean> {
  try {
    await stat(join(repoPath, ".git"));
    return true;
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

// Same count `wc -l` reports; unreadable files have no count.
async function countLines(filePath: string): Promise<number | undefined> {
  try {
    const content = await readFile(filePath, "utf8");
    return content.split("\n").length - 1;
  } catch (error) {
    if (isErrnoException(error)) {
      return undefined;
    }
    throw error;
  }
}

function compareNames(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}
