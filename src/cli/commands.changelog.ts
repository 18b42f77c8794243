import { resolve } from "node:path";
import { createGitCliffGenerator, type ChangelogGenerator } from "../changelog/generator.js";
import { generateAll } from "../changelog/runner.js";
import { loadConfig, type LoadConfigOptions } from "../config/load.js";
import type { ResolvedFleetConfig } from "../config/schema.js";
import { logger, type Logger } from "../logging/logger.js";
import { createGitTransport, type HistoryProbe } from "../repo/transport.js";
import { formatChangelogEvent, listCancelled, renderSummary } from "../report/render.js";
import { exitCodeFor } from "../report/summary.js";
import type { CommandContext, CommandResult } from "../types/index.js";
import { isHelpFlag } from "./router.js";

export interface ChangelogCommandDeps {
  loadConfig: (options?: LoadConfigOptions) => Promise<ResolvedFleetConfig>;
  createGenerator: (config: ResolvedFleetConfig["changelog"]) => ChangelogGenerator;
  history: HistoryProbe;
  log: Pick<Logger, "info" | "warn" | "emit">;
}

interface ChangelogArgs {
  help: boolean;
  dir?: string;
}

const defaultDeps: ChangelogCommandDeps = {
  loadConfig,
  createGenerator: (config) => createGitCliffGenerator({ command: config.command, args: config.args }),
  history: createGitTransport(),
  log: logger
};

export async function runChangelogCommand(
  args: string[],
  context: CommandContext = {},
  deps: ChangelogCommandDeps = defaultDeps
): Promise<CommandResult> {
  const parsed = parseChangelogArgs(args);
  if (parsed.help) {
    return { message: renderChangelogHelp(), exitCode: 0 };
  }

  const config = await deps.loadConfig({ configPath: context.configPath, cwd: context.cwd });
  const reposRoot = parsed.dir === undefined ? config.changelog.dir : resolve(context.cwd ?? process.cwd(), parsed.dir);
  const outputFile = config.changelog.output_file;

  deps.log.info(`Generating ${outputFile} for repositories in ${reposRoot}`);

  const result = await generateAll(reposRoot, outputFile, deps.createGenerator(config.changelog), {
    concurrency: config.changelog.concurrency,
    timeoutMs: config.changelog.timeout_ms,
    signal: context.signal,
    history: deps.history,
    onEvent: (event) => deps.log.emit(formatChangelogEvent(event))
  });

  deps.log.emit(renderSummary("CHANGELOG SUMMARY", result.summary));

  if (context.signal?.aborted) {
    const cancelled = listCancelled(result.outcomes);
    if (cancelled.length > 0) {
      deps.log.warn(`Not started: ${cancelled.join(", ")}`);
    }
    return { message: "Changelog generation cancelled.", exitCode: 130 };
  }

  if (result.summary.total === 0) {
    deps.log.warn(`Clone repositories into ${reposRoot} first, for example with 'repo-fleet fetch'.`);
  }

  const exitCode = exitCodeFor(result.summary);
  return {
    message:
      exitCode === 0
        ? "Changelog generation finished."
        : `Changelog generation finished with ${result.summary.failed} failed.`,
    exitCode
  };
}

function parseChangelogArgs(args: string[]): ChangelogArgs {
  const parsed: ChangelogArgs = { help: false };

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (isHelpFlag(token)) {
      parsed.help = true;
      continue;
    }

    if (token === "-d" || token === "--dir") {
      const value = args[index + 1];
      if (!value || value.startsWith("-")) {
        throw new Error(`${token} requires a directory.`);
      }
      parsed.dir = value;
      index += 1;
      continue;
    }

    throw new Error(`Unknown option: ${token}. Use --help for usage.`);
  }

  return parsed;
}

export function renderChangelogHelp(): string {
  return [
    "Usage: repo-fleet changelog [options]",
    "",
    "Generate a changelog for every git repository in the repositories directory.",
    "",
    "Options:",
    "  -d, --dir <path>      Use this repositories directory instead of changelog.dir",
    "  -h, --help            Show this help message",
    "",
    "Requirements:",
    "  git-cliff (or changelog.command) must be installed: https://git-cliff.org/docs/installation",
    "",
    "Examples:",
    "  repo-fleet changelog                # use changelog.dir (default cloned_repos)",
    "  repo-fleet changelog -d my_repos    # use my_repos"
  ].join("\n");
}
