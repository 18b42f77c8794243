import { execFile } from "node:child_process";

const DEFAULT_MAX_BUFFER_BYTES = 16 * 1024 * 1024;

export interface ProcessRunOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ProcessRunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export type ProcessRunner = (command: string, args: string[], options?: ProcessRunOptions) => Promise<ProcessRunResult>;

export class ProcessSpawnError extends Error {
  readonly command: string;
  readonly code: string | undefined;

  constructor(command: string, message: string, code: string | undefined, options?: ErrorOptions) {
    super(message, options);
    this.name = "ProcessSpawnError";
    this.command = command;
    this.code = code;
  }
}

/**
 * Runs a program without a shell. A non-zero exit resolves with its code;
 * spawn failures, timeouts and aborts reject with a ProcessSpawnError.
 */
export const runProcess: ProcessRunner = (command, args, options = {}) => {
  return new Promise((resolvePromise, rejectPromise) => {
    execFile(
      command,
      args,
      {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        timeout: options.timeoutMs,
        signal: options.signal,
        encoding: "utf8",
        maxBuffer: DEFAULT_MAX_BUFFER_BYTES
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolvePromise({ exitCode: 0, stdout, stderr });
          return;
        }

        if (typeof error.code === "number") {
          resolvePromise({ exitCode: error.code, stdout, stderr });
          return;
        }

        const label = [command, ...args].join(" ");
        if (error.name === "AbortError") {
          rejectPromise(new ProcessSpawnError(command, `Command aborted: ${label}`, "ABORT_ERR", { cause: error }));
          return;
        }

        const code = typeof error.code === "string" ? error.code : undefined;
        if (code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
          rejectPromise(
            new ProcessSpawnError(command, `Command output exceeded ${DEFAULT_MAX_BUFFER_BYTES} bytes: ${label}`, code, {
              cause: error
            })
          );
          return;
        }

        if (error.killed) {
          const reason = options.timeoutMs === undefined ? "was killed" : `timed out after ${options.timeoutMs}ms`;
          rejectPromise(new ProcessSpawnError(command, `Command ${reason}: ${label}`, "ETIMEDOUT", { cause: error }));
          return;
        }

        rejectPromise(new ProcessSpawnError(command, `Failed to run '${label}': ${error.message}`, code, { cause: error }));
      }
    );
  });
};

export function isCommandNotFound(error: unknown): boolean {
  return error instanceof ProcessSpawnError && error.code === "ENOENT";
}

export function describeFailure(result: ProcessRunResult): string {
  const output = result.stderr.trim() || result.stdout.trim();
  return output === "" ? `exit code ${result.exitCode}` : `exit code ${result.exitCode}: ${output}`;
}
