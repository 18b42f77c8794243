import type { ResolvedFleetConfig } from "./schema.js";

export const CONFIG_FILENAME = "repo-fleet.toml";

export const defaultConfig: ResolvedFleetConfig = {
  fetch: {
    target_root: "cloned_repos",
    mode: "sparse",
    paths: ["README.md", "src/"],
    repos: [],
    concurrency: 1,
    retries: 0,
    retry_delay_ms: 1000,
    timeout_ms: 10 * 60 * 1000
  },
  changelog: {
    dir: "cloned_repos",
    output_file: "CHANGELOG.md",
    command: "git-cliff",
    args: [],
    concurrency: 1,
    timeout_ms: 2 * 60 * 1000
  }
};
