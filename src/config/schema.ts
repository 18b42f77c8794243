import type { FetchMode } from "../types/index.js";

export interface ResolvedFleetConfig {
  fetch: {
    target_root: string;
    mode: FetchMode;
    paths: string[];
    repos: string[];
    concurrency: number;
    retries: number;
    retry_delay_ms: number;
    timeout_ms: number;
  };
  changelog: {
    dir: string;
    output_file: string;
    command: string;
    args: string[];
    concurrency: number;
    timeout_ms: number;
  };
}
