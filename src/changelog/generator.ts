import { describeFailure, isCommandNotFound, runProcess, type ProcessRunner, type ProcessRunResult } from "../runtime/process.js";
import { FleetError, toErrorMessage } from "../runtime/errors.js";
import type { StepResult, TransportCallOptions } from "../repo/transport.js";

const VERSION_CHECK_TIMEOUT_MS = 10_000;

export interface ChangelogGenerator {
  readonly command: string;
  /** Resolves with the tool's version line; throws a `prerequisite_missing` FleetError when it cannot run. */
  ensureAvailable(options?: TransportCallOptions): Promise<string>;
  generate(repoPath: string, outputFileName: string, options?: TransportCallOptions): Promise<StepResult>;
}

export interface GitCliffOptions {
  command?: string;
  args?: string[];
  run?: ProcessRunner;
  platform?: NodeJS.Platform;
}

export function createGitCliffGenerator(options: GitCliffOptions = {}): ChangelogGenerator {
  const command = options.command ?? "git-cliff";
  const extraArgs = options.args ?? [];
  const run = options.run ?? runProcess;
  const installHint = getGitCliffInstallHint(options.platform);

  return {
    command,
    async ensureAvailable(callOptions = {}) {
      let result: ProcessRunResult;
      try {
        result = await run(command, ["--version"], {
          signal: callOptions.signal,
          timeoutMs: callOptions.timeoutMs ?? VERSION_CHECK_TIMEOUT_MS
        });
      } catch (error) {
        const detail = isCommandNotFound(error) ? `${command} is not installed or not in PATH` : toErrorMessage(error);
        throw new FleetError("prerequisite_missing", `${detail}. Install hint: ${installHint}`, { cause: error });
      }

      if (result.exitCode !== 0) {
        throw new FleetError(
          "prerequisite_missing",
          `${command} --version failed with ${describeFailure(result)}. Install hint: ${installHint}`
        );
      }

      return result.stdout.trim() || command;
    },
    async generate(repoPath, outputFileName, callOptions = {}) {
      let result: ProcessRunResult;
      try {
        result = await run(command, [...extraArgs, "--output", outputFileName], {
          cwd: repoPath,
          signal: callOptions.signal,
          timeoutMs: callOptions.timeoutMs
        });
      } catch (error) {
        return { ok: false, message: toErrorMessage(error) };
      }

      if (result.exitCode !== 0) {
        return { ok: false, message: `${command} failed with ${describeFailure(result)}` };
      }
      return { ok: true };
    }
  };
}

function getGitCliffInstallHint(platform: NodeJS.Platform = process.platform): string {
  if (platform === "darwin") {
    return "brew install git-cliff";
  }

  return "cargo install git-cliff, or see https://git-cliff.org/docs/installation";
}
