import { access, constants, mkdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { mapWithConcurrency } from "../runtime/pool.js";
import { FleetError, isErrnoException, toErrorMessage, type FleetErrorKind } from "../runtime/errors.js";
import { resolveRetryPolicy, withRetry, type RetryPolicy, type SleepFn } from "../runtime/retry.js";
import { toRunReport, type OperationOutcome, type RunReport } from "../report/summary.js";
import type { FetchMode } from "../types/index.js";
import type { LocalRepository, RepositoryDescriptor } from "./descriptor.js";
import { expandPathFilters } from "./path-filter.js";
import type { RepoTransport, StepResult } from "./transport.js";

export type FetchStep = "clone" | "filter" | "checkout";

export type FetchEvent =
  | { type: "repo:start"; index: number; total: number; name: string; identifier: string; mode: FetchMode }
  | {
      type: "repo:retry";
      name: string;
      step: FetchStep;
      attempt: number;
      nextAttempt: number;
      error: string;
    }
  | { type: "repo:outcome"; index: number; total: number; identifier: string; outcome: OperationOutcome };

export type MaterializedCheck = (targetPath: string, descriptor: RepositoryDescriptor) => Promise<boolean>;

export interface FetchAllOptions {
  mode?: FetchMode;
  concurrency?: number;
  retryPolicy?: Partial<RetryPolicy>;
  timeoutMs?: number;
  signal?: AbortSignal;
  sleep?: SleepFn;
  isMaterialized?: MaterializedCheck;
  onEvent?: (event: FetchEvent) => void;
}

export interface FetchAllResult extends RunReport {
  repositories: LocalRepository[];
}

const STEP_FAILURES: Record<FetchStep, { reason: string; kind: FleetErrorKind }> = {
  clone: { reason: "clone error", kind: "transport" },
  filter: { reason: "filter error", kind: "filter_config" },
  checkout: { reason: "checkout error", kind: "materialization" }
};

export async function fetchAll(
  descriptors: readonly RepositoryDescriptor[],
  targetRoot: string,
  pathFilters: readonly string[],
  transport: RepoTransport,
  options: FetchAllOptions = {}
): Promise<FetchAllResult> {
  const mode = options.mode ?? "sparse";
  const patterns = expandPathFilters(pathFilters);
  if (mode === "sparse" && patterns.length === 0) {
    throw new FleetError("invalid_config", "Sparse fetch requires at least one path filter.");
  }

  const retryPolicy = resolveRetryPolicy(options.retryPolicy);
  const isMaterialized = options.isMaterialized ?? directoryExists;
  await ensureTargetRoot(targetRoot);

  const total = descriptors.length;
  const duplicates = findDuplicateNames(descriptors);
  const repositories: LocalRepository[] = [];

  const runStep = async (
    descriptor: RepositoryDescriptor,
    step: FetchStep,
    call: () => Promise<StepResult>
  ): Promise<StepResult> => {
    try {
      await withRetry(
        async () => {
          const result = await call();
          if (!result.ok) {
            throw new FleetError(STEP_FAILURES[step].kind, result.message);
          }
        },
        retryPolicy,
        {
          sleep: options.sleep,
          signal: options.signal,
          onRetry: (error, attempt, nextAttempt) => {
            options.onEvent?.({
              type: "repo:retry",
              name: descriptor.derivedName,
              step,
              attempt,
              nextAttempt,
              error: toErrorMessage(error)
            });
          }
        }
      );
      return { ok: true };
    } catch (error) {
      return { ok: false, message: toErrorMessage(error) };
    }
  };

  const fetchOne = async (descriptor: RepositoryDescriptor, index: number): Promise<OperationOutcome> => {
    const name = descriptor.derivedName;
    const path = join(targetRoot, name);
    const callOptions = { signal: options.signal, timeoutMs: options.timeoutMs };

    if (duplicates.has(index)) {
      return { status: "skipped", name, path, reason: "already exists" };
    }

    try {
      if (await isMaterialized(path, descriptor)) {
        return { status: "skipped", name, path, reason: "already exists" };
      }
    } catch (error) {
      return { status: "failed", name, path, reason: "access error", error: toErrorMessage(error) };
    }

    const failed = (step: FetchStep, result: StepResult): OperationOutcome => ({
      status: "failed",
      name,
      path,
      reason: STEP_FAILURES[step].reason,
      error: result.ok ? undefined : result.message
    });

    if (mode === "full") {
      const cloned = await runStep(descriptor, "clone", () => transport.cloneFull(descriptor.identifier, path, callOptions));
      if (!cloned.ok) {
        return failed("clone", cloned);
      }
      repositories.push({ name, path, materialized: true, hasCommitHistory: false });
      return { status: "success", name, path, detail: "full clone" };
    }

    const cloned = await runStep(descriptor, "clone", () =>
      transport.cloneMetadataOnly(descriptor.identifier, path, callOptions)
    );
    if (!cloned.ok) {
      return failed("clone", cloned);
    }

    const filtered = await runStep(descriptor, "filter", () => transport.setPathFilters(path, patterns, callOptions));
    if (!filtered.ok) {
      return failed("filter", filtered);
    }

    const checkedOut = await runStep(descriptor, "checkout", () => transport.materialize(path, callOptions));
    if (!checkedOut.ok) {
      return failed("checkout", checkedOut);
    }

    repositories.push({ name, path, materialized: true, hasCommitHistory: false });
    return { status: "success", name, path, detail: `paths: ${patterns.join(", ")}` };
  };

  const outcomes = await mapWithConcurrency(
    descriptors,
    async (descriptor, index) => {
      options.onEvent?.({
        type: "repo:start",
        index,
        total,
        name: descriptor.derivedName,
        identifier: descriptor.identifier,
        mode
      });
      const outcome = await fetchOne(descriptor, index);
      options.onEvent?.({ type: "repo:outcome", index, total, identifier: descriptor.identifier, outcome });
      return outcome;
    },
    {
      concurrency: options.concurrency ?? 1,
      signal: options.signal,
      onCancelled: (descriptor): OperationOutcome => ({
        status: "skipped",
        name: descriptor.derivedName,
        path: join(targetRoot, descriptor.derivedName),
        reason: "cancelled"
      })
    }
  );

  return {
    ...toRunReport(outcomes),
    repositories: sortByOutcomeOrder(repositories, outcomes)
  };
}

async function ensureTargetRoot(targetRoot: string): Promise<void> {
  try {
    await mkdir(targetRoot, { recursive: true });
    await access(targetRoot, constants.W_OK);
  } catch (error) {
    throw new FleetError(
      "root_unavailable",
      `Cannot access target root '${targetRoot}': ${toErrorMessage(error)}`,
      { cause: error }
    );
  }
}

async function directoryExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

function findDuplicateNames(descriptors: readonly RepositoryDescriptor[]): Set<number> {
  const claimed = new Set<string>();
  const duplicates = new Set<number>();

  for (const [index, descriptor] of descriptors.entries()) {
    if (claimed.has(descriptor.derivedName)) {
      duplicates.add(index);
      continue;
    }
    claimed.add(descriptor.derivedName);
  }

  return duplicates;
}

function sortByOutcomeOrder(repositories: LocalRepository[], outcomes: OperationOutcome[]): LocalRepository[] {
  const order = new Map(outcomes.map((outcome, index) => [outcome.path, index]));
  return [...repositories].sort((left, right) => (order.get(left.path) ?? 0) - (order.get(right.path) ?? 0));
}
