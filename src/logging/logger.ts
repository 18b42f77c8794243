import type { RenderedLine } from "../report/render.js";

type LogLevel = "info" | "success" | "warn" | "error";

let verboseEnabled = false;

const levelPrefix: Record<LogLevel, string> = {
  info: "INFO",
  success: "SUCCESS",
  warn: "WARN",
  error: "ERROR"
};

const ansi = {
  reset: "\u001b[0m",
  blue: "\u001b[34m",
  green: "\u001b[32m",
  yellow: "\u001b[33m",
  red: "\u001b[31m"
} as const;

const levelColor: Record<LogLevel, string> = {
  info: ansi.blue,
  success: ansi.green,
  warn: ansi.yellow,
  error: ansi.red
};

function isColorEnabled(output: NodeJS.WriteStream): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }

  const forceColor = process.env.FORCE_COLOR;
  if (forceColor !== undefined && forceColor !== "0") {
    return true;
  }

  return output.isTTY === true;
}

function formatPrefix(level: LogLevel, output: NodeJS.WriteStream): string {
  const prefix = `[${levelPrefix[level]}]`;
  if (!isColorEnabled(output)) {
    return prefix;
  }

  return `${levelColor[level]}${prefix}${ansi.reset}`;
}

function write(level: LogLevel, message: string): void {
  const output = level === "error" ? process.stderr : process.stdout;
  const line = `${formatPrefix(level, output)} ${message}`;
  if (level === "error") {
    console.error(line);
    return;
  }

  console.log(line);
}

export function setVerboseLoggingEnabled(enabled: boolean): void {
  verboseEnabled = enabled;
}

export const logger = {
  info(message: string): void {
    write("info", message);
  },
  success(message: string): void {
    write("success", message);
  },
  verbose(message: string): void {
    if (!verboseEnabled) {
      return;
    }
    write("info", message);
  },
  warn(message: string): void {
    write("warn", message);
  },
  error(message: string): void {
    write("error", message);
  },
  emit(lines: readonly RenderedLine[]): void {
    for (const line of lines) {
      if (line.level !== "verbose") {
        write(line.level, line.message);
      } else if (verboseEnabled) {
        write("info", line.message);
      }
    }
  }
};

export type Logger = typeof logger;
