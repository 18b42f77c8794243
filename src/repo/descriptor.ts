import { FleetError } from "../runtime/errors.js";

export interface RepositoryDescriptor {
  readonly identifier: string;
  readonly derivedName: string;
}

export interface LocalRepository {
  name: string;
  path: string;
  materialized: boolean;
  /** Always false after fetch; the changelog runner probes HEAD and fills it in. */
  hasCommitHistory: boolean;
}

/** `git@host:org/a.git` -> `a`, `https://host/org/b/` -> `b`. */
export function deriveRepoName(identifier: string): string {
  const trimmed = identifier.trim().replace(/[\\/]+$/, "");
  const segments = trimmed.split(/[\\/:]/);
  const last = segments[segments.length - 1] ?? "";
  return last.endsWith(".git") ? last.slice(0, -".git".length) : last;
}

export function createDescriptor(identifier: string): RepositoryDescriptor {
  const normalized = identifier.trim();
  if (normalized === "") {
    throw new FleetError("invalid_config", "Invalid repository identifier: expected a non-empty string.");
  }

  const derivedName = deriveRepoName(normalized);
  if (derivedName === "" || derivedName === "." || derivedName === "..") {
    throw new FleetError(
      "invalid_config",
      `Invalid repository identifier '${normalized}': cannot derive a local directory name.`
    );
  }

  return Object.freeze({ identifier: normalized, derivedName });
}

export function createDescriptors(identifiers: readonly string[]): RepositoryDescriptor[] {
  return identifiers.map((identifier) => createDescriptor(identifier));
}
