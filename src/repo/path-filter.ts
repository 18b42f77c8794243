/**
 * Expands configured include paths into sparse-checkout patterns. Every
 * pattern is anchored at the repository root, so `README.md` does not also
 * match `docs/README.md`. A directory entry (trailing `/`) is followed by its
 * `dir/*` companion so the directory's contents match as well.
 */
export function expandPathFilters(paths: readonly string[]): string[] {
  const patterns: string[] = [];
  const seen = new Set<string>();

  const add = (pattern: string): void => {
    if (seen.has(pattern)) {
      return;
    }
    seen.add(pattern);
    patterns.push(pattern);
  };

  for (const rawPath of paths) {
    const trimmed = rawPath.trim();
    if (trimmed === "" || trimmed === "/") {
      continue;
    }

    const path = trimmed.startsWith("/") ? trimmed : `/${trimmed}`;

    add(path);
    if (path.endsWith("/")) {
      add(`${path}*`);
    }
  }

  return patterns;
}
