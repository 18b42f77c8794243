import type { CliCommandName } from "../types/index.js";

export interface ResolvedCliCommand {
  command: CliCommandName;
  args: string[];
}

export interface GlobalCliOptions {
  args: string[];
  verbose: boolean;
  configPath?: string;
}

export function isHelpFlag(token: string): boolean {
  return token === "-h" || token === "--help";
}

export function parseGlobalCliOptions(argv: string[]): GlobalCliOptions {
  let verbose = false;
  let configPath: string | undefined;
  const args: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === "--verbose") {
      verbose = true;
      continue;
    }

    if (token === "--config") {
      const value = argv[index + 1];
      if (!value || value.startsWith("-")) {
        throw new Error("--config requires a path.");
      }
      configPath = value;
      index += 1;
      continue;
    }

    args.push(token);
  }

  return { args, verbose, configPath };
}

export function resolveCliCommand(argv: string[]): ResolvedCliCommand {
  const [first, ...rest] = argv;

  if (!first || isHelpFlag(first) || first === "help") {
    return { command: "help", args: [] };
  }

  if (first === "fetch" || first === "changelog") {
    return { command: first, args: rest };
  }

  throw new Error(`Unknown command: ${first}. Use --help for usage.`);
}

export function renderHelp(): string {
  return [
    "repo-fleet CLI",
    "",
    "Usage:",
    "  repo-fleet <command> [options]",
    "",
    "Config resolution:",
    "  --config <path> -> ./repo-fleet.toml -> global user config repo-fleet.toml -> defaults",
    "",
    "Commands:",
    "  fetch      Sparse-clone every configured repository into the target root",
    "  changelog  Generate a changelog for every repository under the repositories root",
    "",
    "Options:",
    "  --config <path>       Use this config file",
    "  --verbose             Show detailed per-repository logs",
    "  -h, --help            Show help"
  ].join("\n");
}
