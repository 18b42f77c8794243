import { loadConfig, type LoadConfigOptions } from "../config/load.js";
import type { ResolvedFleetConfig } from "../config/schema.js";
import { logger, type Logger } from "../logging/logger.js";
import { createDescriptors } from "../repo/descriptor.js";
import { fetchAll } from "../repo/fetch.js";
import { createGitTransport, type RepoTransport } from "../repo/transport.js";
import { formatFetchEvent, listCancelled, renderSummary } from "../report/render.js";
import { exitCodeFor } from "../report/summary.js";
import type { CommandContext, CommandResult } from "../types/index.js";
import { isHelpFlag } from "./router.js";

export interface FetchCommandDeps {
  loadConfig: (options?: LoadConfigOptions) => Promise<ResolvedFleetConfig>;
  transport: RepoTransport;
  log: Pick<Logger, "info" | "warn" | "emit">;
}

const defaultDeps: FetchCommandDeps = {
  loadConfig,
  transport: createGitTransport(),
  log: logger
};

export async function runFetchCommand(
  args: string[],
  context: CommandContext = {},
  deps: FetchCommandDeps = defaultDeps
): Promise<CommandResult> {
  if (args.some(isHelpFlag)) {
    return { message: renderFetchHelp(), exitCode: 0 };
  }

  if (args.length > 0) {
    throw new Error(`Unknown option: ${args[0]}. fetch takes no options; use --help for usage.`);
  }

  const config = await deps.loadConfig({ configPath: context.configPath, cwd: context.cwd });
  const { target_root: targetRoot, mode, paths } = config.fetch;
  const descriptors = createDescriptors(config.fetch.repos);

  deps.log.info(
    mode === "sparse"
      ? `Sparse-cloning ${descriptors.length} repositories (${paths.join(", ")}) into ${targetRoot}`
      : `Cloning ${descriptors.length} repositories into ${targetRoot}`
  );

  const result = await fetchAll(descriptors, targetRoot, paths, deps.transport, {
    mode,
    concurrency: config.fetch.concurrency,
    retryPolicy: {
      attempts: config.fetch.retries + 1,
      delayMs: config.fetch.retry_delay_ms
    },
    timeoutMs: config.fetch.timeout_ms,
    signal: context.signal,
    onEvent: (event) => deps.log.emit(formatFetchEvent(event))
  });

  deps.log.emit(renderSummary("FETCH SUMMARY", result.summary));
  deps.log.info(`Target folder: ${targetRoot}`);

  if (context.signal?.aborted) {
    const cancelled = listCancelled(result.outcomes);
    if (cancelled.length > 0) {
      deps.log.warn(`Not started: ${cancelled.join(", ")}`);
    }
    return { message: "Fetch cancelled.", exitCode: 130 };
  }

  const exitCode = exitCodeFor(result.summary);
  return {
    message: exitCode === 0 ? "Fetch finished." : `Fetch finished with ${result.summary.failed} failed.`,
    exitCode
  };
}

export function renderFetchHelp(): string {
  return [
    "Usage: repo-fleet fetch",
    "",
    "Clone every repository listed in fetch.repos into fetch.target_root.",
    "Existing directories are skipped; a failed repository does not stop the others.",
    "",
    "Settings (repo-fleet.toml, [fetch] table):",
    "  target_root     Target folder (env REPO_FLEET_TARGET_ROOT, default cloned_repos)",
    "  mode            sparse | full",
    "  paths           Paths kept by a sparse clone (default README.md, src/)",
    "  concurrency     Repositories fetched at once (default 1)",
    "  retries         Extra attempts per git step (default 0)"
  ].join("\n");
}
