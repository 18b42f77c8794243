export type CliCommandName = "fetch" | "changelog" | "help";

export type FetchMode = "sparse" | "full";

export interface CommandResult {
  message: string;
  exitCode?: number;
}

export interface CommandContext {
  configPath?: string;
  cwd?: string;
  signal?: AbortSignal;
}
