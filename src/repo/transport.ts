import { describeFailure, runProcess, type ProcessRunner, type ProcessRunResult } from "../runtime/process.js";
import { toErrorMessage } from "../runtime/errors.js";

export type StepResult = { ok: true } | { ok: false; message: string };

export interface TransportCallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Remote repository operations used by the fetch orchestrator. Implementations
 * report failure through the result instead of throwing.
 */
export interface RepoTransport {
  cloneMetadataOnly(identifier: string, targetPath: string, options?: TransportCallOptions): Promise<StepResult>;
  setPathFilters(repoPath: string, patterns: readonly string[], options?: TransportCallOptions): Promise<StepResult>;
  materialize(repoPath: string, options?: TransportCallOptions): Promise<StepResult>;
  cloneFull(identifier: string, targetPath: string, options?: TransportCallOptions): Promise<StepResult>;
}

export interface HistoryProbe {
  hasCommits(repoPath: string, options?: TransportCallOptions): Promise<boolean>;
}

export interface GitCliOptions {
  gitBinary?: string;
  run?: ProcessRunner;
}

// Credentials belong to git's own helpers; never block on a prompt.
const GIT_ENV: Record<string, string> = {
  GIT_TERMINAL_PROMPT: "0"
};

export function createGitTransport(options: GitCliOptions = {}): RepoTransport & HistoryProbe {
  const gitBinary = options.gitBinary ?? "git";
  const run = options.run ?? runProcess;

  const git = async (args: string[], callOptions: TransportCallOptions = {}, cwd?: string): Promise<StepResult> => {
    let result: ProcessRunResult;
    try {
      result = await run(gitBinary, args, {
        cwd,
        env: GIT_ENV,
        signal: callOptions.signal,
        timeoutMs: callOptions.timeoutMs
      });
    } catch (error) {
      return { ok: false, message: toErrorMessage(error) };
    }

    if (result.exitCode !== 0) {
      return { ok: false, message: `git ${args[0]} failed with ${describeFailure(result)}` };
    }
    return { ok: true };
  };

  return {
    cloneMetadataOnly(identifier, targetPath, callOptions) {
      return git(["clone", "--filter=blob:none", "--no-checkout", "--", identifier, targetPath], callOptions);
    },
    setPathFilters(repoPath, patterns, callOptions) {
      return git(["sparse-checkout", "set", "--no-cone", ...patterns], callOptions, repoPath);
    },
    materialize(repoPath, callOptions) {
      return git(["checkout"], callOptions, repoPath);
    },
    cloneFull(identifier, targetPath, callOptions) {
      return git(["clone", "--", identifier, targetPath], callOptions);
    },
    async hasCommits(repoPath, callOptions = {}) {
      const result = await run(gitBinary, ["rev-parse", "--verify", "--quiet", "HEAD"], {
        cwd: repoPath,
        env: GIT_ENV,
        signal: callOptions.signal,
        timeoutMs: callOptions.timeoutMs
      });
      return result.exitCode === 0;
    }
  };
}
