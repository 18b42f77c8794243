import { logger, setVerboseLoggingEnabled } from "../logging/logger.js";
import { toErrorMessage } from "../runtime/errors.js";
import type { CommandContext, CommandResult } from "../types/index.js";
import { runChangelogCommand } from "./commands.changelog.js";
import { runFetchCommand } from "./commands.fetch.js";
import { parseGlobalCliOptions, renderHelp, resolveCliCommand } from "./router.js";

export interface CliCommands {
  fetch: (args: string[], context: CommandContext) => Promise<CommandResult>;
  changelog: (args: string[], context: CommandContext) => Promise<CommandResult>;
}

const CANCELLED_EXIT_CODE = 130;

const defaultCommands: CliCommands = {
  fetch: (args, context) => runFetchCommand(args, context),
  changelog: (args, context) => runChangelogCommand(args, context)
};

export async function runCli(
  argv: string[],
  options: { signal?: AbortSignal } = {},
  commands: CliCommands = defaultCommands
): Promise<number> {
  try {
    const globalOptions = parseGlobalCliOptions(argv);
    setVerboseLoggingEnabled(globalOptions.verbose);
    const resolved = resolveCliCommand(globalOptions.args);

    if (resolved.command === "help") {
      logger.info(renderHelp());
      return 0;
    }

    const context: CommandContext = {
      configPath: globalOptions.configPath,
      signal: options.signal
    };
    const result = await commands[resolved.command](resolved.args, context);
    const exitCode = result.exitCode ?? 0;
    if (exitCode === 0) {
      logger.info(result.message);
    } else {
      logger.error(result.message);
    }
    return exitCode;
  } catch (error) {
    logger.error(toErrorMessage(error, "Unexpected CLI failure"));
    return options.signal?.aborted ? CANCELLED_EXIT_CODE : 1;
  }
}
