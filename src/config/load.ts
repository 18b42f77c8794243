import { access, readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { basename, join, resolve } from "node:path";
import { parse as parseDotEnv } from "dotenv";
import { parse as parseToml } from "smol-toml";
import { FleetError, isErrnoException } from "../runtime/errors.js";
import type { ResolvedFleetConfig } from "./schema.js";
import { CONFIG_FILENAME, defaultConfig } from "./defaults.js";

type JsonRecord = Record<string, unknown>;

export interface LoadConfigOptions {
  configPath?: string;
  envPath?: string;
  cwd?: string;
  platform?: NodeJS.Platform;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedFleetConfig {
  config: ResolvedFleetConfig;
  configPath: string | undefined;
  scope: "explicit" | "local" | "global" | "defaults";
}

const FETCH_MODES = ["sparse", "full"] as const;

export async function loadConfig(options: LoadConfigOptions = {}): Promise<ResolvedFleetConfig> {
  const loaded = await loadConfigWithMetadata(options);
  return loaded.config;
}

export async function loadConfigWithMetadata(options: LoadConfigOptions = {}): Promise<LoadedFleetConfig> {
  const cwd = options.cwd ?? process.cwd();
  const located = await locateConfigFile(options);
  const envPath = options.envPath ?? resolve(cwd, ".env");

  const rawConfig: JsonRecord = located.path === undefined ? {} : await readTomlConfig(located.path);
  const parsedEnv = await readEnvFile(envPath);
  const mergedEnv: NodeJS.ProcessEnv = {
    ...parsedEnv,
    ...(options.env ?? process.env)
  };

  const fetchRaw = getOptionalTable(rawConfig, "fetch", "fetch");
  const changelogRaw = getOptionalTable(rawConfig, "changelog", "changelog");

  const targetRoot =
    getEnvOverride(mergedEnv, "REPO_FLEET_TARGET_ROOT") ??
    getOptionalString(fetchRaw, "target_root", "fetch.target_root") ??
    defaultConfig.fetch.target_root;
  const changelogDir =
    getEnvOverride(mergedEnv, "REPO_FLEET_CHANGELOG_DIR") ??
    getOptionalString(changelogRaw, "dir", "changelog.dir") ??
    targetRoot;

  const resolved: ResolvedFleetConfig = {
    fetch: {
      target_root: resolve(cwd, targetRoot),
      mode: getOptionalEnum(fetchRaw, "mode", "fetch.mode", FETCH_MODES) ?? defaultConfig.fetch.mode,
      paths: getOptionalStringArray(fetchRaw, "paths", "fetch.paths") ?? [...defaultConfig.fetch.paths],
      repos: getOptionalStringArray(fetchRaw, "repos", "fetch.repos") ?? [...defaultConfig.fetch.repos],
      concurrency: getOptionalNumber(fetchRaw, "concurrency", "fetch.concurrency") ?? defaultConfig.fetch.concurrency,
      retries: getOptionalNumber(fetchRaw, "retries", "fetch.retries") ?? defaultConfig.fetch.retries,
      retry_delay_ms:
        getOptionalNumber(fetchRaw, "retry_delay_ms", "fetch.retry_delay_ms") ?? defaultConfig.fetch.retry_delay_ms,
      timeout_ms: getOptionalNumber(fetchRaw, "timeout_ms", "fetch.timeout_ms") ?? defaultConfig.fetch.timeout_ms
    },
    changelog: {
      dir: resolve(cwd, changelogDir),
      output_file:
        getOptionalString(changelogRaw, "output_file", "changelog.output_file") ?? defaultConfig.changelog.output_file,
      command: getOptionalString(changelogRaw, "command", "changelog.command") ?? defaultConfig.changelog.command,
      args: getOptionalStringArray(changelogRaw, "args", "changelog.args") ?? [...defaultConfig.changelog.args],
      concurrency:
        getOptionalNumber(changelogRaw, "concurrency", "changelog.concurrency") ?? defaultConfig.changelog.concurrency,
      timeout_ms:
        getOptionalNumber(changelogRaw, "timeout_ms", "changelog.timeout_ms") ?? defaultConfig.changelog.timeout_ms
    }
  };

  validateConfig(resolved);

  return {
    config: resolved,
    configPath: located.path,
    scope: located.scope
  };
}

function validateConfig(config: ResolvedFleetConfig): void {
  assertInteger(config.fetch.concurrency, 1, "fetch.concurrency", "an integer greater than or equal to 1");
  assertInteger(config.fetch.retries, 0, "fetch.retries", "an integer greater than or equal to 0");
  assertInteger(config.fetch.retry_delay_ms, 0, "fetch.retry_delay_ms", "a non-negative integer in milliseconds");
  assertInteger(config.fetch.timeout_ms, 1, "fetch.timeout_ms", "a positive integer in milliseconds");
  assertInteger(config.changelog.concurrency, 1, "changelog.concurrency", "an integer greater than or equal to 1");
  assertInteger(config.changelog.timeout_ms, 1, "changelog.timeout_ms", "a positive integer in milliseconds");

  if (config.fetch.mode === "sparse" && config.fetch.paths.every((path) => path.trim() === "")) {
    throw new FleetError("invalid_config", "Invalid fetch.paths: sparse mode requires at least one non-empty path.");
  }

  for (const [index, repo] of config.fetch.repos.entries()) {
    if (repo.trim() === "") {
      throw new FleetError("invalid_config", `Invalid fetch.repos[${index}]: expected a non-empty string.`);
    }
  }

  const outputFile = config.changelog.output_file;
  if (outputFile.trim() === "" || basename(outputFile) !== outputFile || outputFile === "." || outputFile === "..") {
    throw new FleetError("invalid_config", "Invalid changelog.output_file: expected a plain file name.");
  }

  if (config.changelog.command.trim() === "") {
    throw new FleetError("invalid_config", "Invalid changelog.command: expected a non-empty string.");
  }
}

function assertInteger(value: number, min: number, path: string, expected: string): void {
  if (!Number.isInteger(value) || value < min) {
    throw new FleetError("invalid_config", `Invalid ${path}: expected ${expected}.`);
  }
}

async function locateConfigFile(
  options: LoadConfigOptions
): Promise<{ path: string | undefined; scope: LoadedFleetConfig["scope"] }> {
  if (options.configPath) {
    return { path: resolve(options.cwd ?? process.cwd(), options.configPath), scope: "explicit" };
  }

  const localPath = resolve(options.cwd ?? process.cwd(), CONFIG_FILENAME);
  if (await pathExists(localPath)) {
    return { path: localPath, scope: "local" };
  }

  const globalPath = getGlobalConfigPath(options);
  if (await pathExists(globalPath)) {
    return { path: globalPath, scope: "global" };
  }

  return { path: undefined, scope: "defaults" };
}

export function getGlobalConfigPath(options: Pick<LoadConfigOptions, "platform" | "env" | "homeDir"> = {}): string {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const resolvedHomeDir = options.homeDir ?? homedir();

  if (platform === "win32") {
    const appData =
      typeof env.APPDATA === "string" && env.APPDATA.trim() !== "" ? env.APPDATA : join(resolvedHomeDir, "AppData", "Roaming");
    return resolve(appData, "repo-fleet", CONFIG_FILENAME);
  }

  const xdgConfigHome =
    typeof env.XDG_CONFIG_HOME === "string" && env.XDG_CONFIG_HOME.trim() !== ""
      ? env.XDG_CONFIG_HOME
      : join(resolvedHomeDir, ".config");
  return resolve(xdgConfigHome, "repo-fleet", CONFIG_FILENAME);
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

async function readTomlConfig(configPath: string): Promise<JsonRecord> {
  let source: string;
  try {
    source = await readFile(configPath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new FleetError("invalid_config", `Cannot load config at '${configPath}': file does not exist.`);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = parseToml(source);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new FleetError("invalid_config", `Cannot parse config at '${configPath}': ${detail}`, { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new FleetError("invalid_config", "Invalid config root: expected a TOML table.");
  }

  return parsed;
}

async function readEnvFile(envPath: string): Promise<Record<string, string>> {
  try {
    const source = await readFile(envPath, "utf8");
    return parseDotEnv(source);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return {};
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new FleetError("invalid_config", `Cannot read env file at '${envPath}': ${detail}`, { cause: error });
  }
}

function getEnvOverride(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

function getOptionalTable(parent: JsonRecord, key: string, path: string): JsonRecord | undefined {
  const value = parent[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new FleetError("invalid_config", `Invalid ${path}: expected a TOML table.`);
  }
  return value;
}

function getOptionalString(parent: JsonRecord | undefined, key: string, path: string): string | undefined {
  const value = parent?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new FleetError("invalid_config", `Invalid ${path}: expected a string.`);
  }
  return value;
}

function getOptionalNumber(parent: JsonRecord | undefined, key: string, path: string): number | undefined {
  const value = parent?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new FleetError("invalid_config", `Invalid ${path}: expected a number.`);
  }
  return value;
}

function getOptionalEnum<T extends readonly string[]>(
  parent: JsonRecord | undefined,
  key: string,
  path: string,
  values: T
): T[number] | undefined {
  const value = getOptionalString(parent, key, path);
  if (value === undefined) {
    return undefined;
  }
  if (!isOneOf(values, value)) {
    throw new FleetError("invalid_config", `Invalid ${path}: expected one of ${values.join("|")}.`);
  }
  return value;
}

function isOneOf<T extends readonly string[]>(values: T, value: string): value is T[number] {
  return values.includes(value);
}

function getOptionalStringArray(parent: JsonRecord | undefined, key: string, path: string): string[] | undefined {
  const value = parent?.[key];
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new FleetError("invalid_config", `Invalid ${path}: expected an array of strings.`);
  }
  return [...value];
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
