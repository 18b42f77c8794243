import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createDescriptors } from "../src/repo/descriptor.js";
import { fetchAll, type FetchEvent } from "../src/repo/fetch.js";
import type { RepoTransport, StepResult } from "../src/repo/transport.js";
import { exitCodeFor } from "../src/report/summary.js";

interface FakeTransportOptions {
  failClone?: string[];
  failFilter?: string[];
  failCheckout?: string[];
  cloneDelayMs?: Record<string, number>;
}

function nameOf(path: string): string {
  return path.split(/[\\/]/).pop() ?? path;
}

function createFakeTransport(options: FakeTransportOptions = {}) {
  let inFlight = 0;
  let maxInFlight = 0;

  const transport = {
    cloneMetadataOnly: vi.fn(async (identifier: string, targetPath: string): Promise<StepResult> => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      try {
        const delayMs = options.cloneDelayMs?.[nameOf(targetPath)] ?? 0;
        if (delayMs > 0) {
          await new Promise((resolve) => setTimeout(resolve, delayMs));
        }
        if (options.failClone?.includes(identifier)) {
          return { ok: false, message: "fatal: could not read from remote repository" };
        }
        await mkdir(join(targetPath, ".git"), { recursive: true });
        return { ok: true };
      } finally {
        inFlight -= 1;
      }
    }),
    setPathFilters: vi.fn(async (repoPath: string): Promise<StepResult> => {
      if (options.failFilter?.includes(nameOf(repoPath))) {
        return { ok: false, message: "sparse-checkout rejected" };
      }
      return { ok: true };
    }),
    materialize: vi.fn(async (repoPath: string): Promise<StepResult> => {
      if (options.failCheckout?.includes(nameOf(repoPath))) {
        return { ok: false, message: "fatal: unable to fetch blobs" };
      }
      await mkdir(join(repoPath, "src"), { recursive: true });
      await writeFile(join(repoPath, "README.md"), `# ${nameOf(repoPath)}\n`);
      await writeFile(join(repoPath, "src", "index.ts"), "export {};\n");
      return { ok: true };
    }),
    cloneFull: vi.fn(async (_identifier: string, targetPath: string): Promise<StepResult> => {
      await mkdir(join(targetPath, ".git"), { recursive: true });
      return { ok: true };
    })
  } satisfies RepoTransport;

  return { transport, maxInFlight: () => maxInFlight };
}

describe("fetchAll", () => {
  let targetRoot = "";

  beforeEach(async () => {
    targetRoot = join(await mkdtemp(join(tmpdir(), "repo-fleet-fetch-")), "cloned_repos");
  });

  afterEach(async () => {
    await rm(join(targetRoot, ".."), { recursive: true, force: true });
  });

  it("sparse-clones every descriptor into an empty target root", async () => {
    const { transport } = createFakeTransport();
    const descriptors = createDescriptors(["host:org/a.git", "host:org/b.git"]);

    const result = await fetchAll(descriptors, targetRoot, ["README.md", "src/"], transport);

    expect(result.outcomes.map((outcome) => outcome.status)).toEqual(["success", "success"]);
    expect(result.summary).toEqual({ total: 2, succeeded: 2, failed: 0, skipped: 0 });
    expect(exitCodeFor(result.summary)).toBe(0);
    expect((await readdir(targetRoot)).sort()).toEqual(["a", "b"]);
    expect((await readdir(join(targetRoot, "a"))).sort()).toEqual([".git", "README.md", "src"]);
    expect(transport.cloneMetadataOnly).toHaveBeenNthCalledWith(1, "host:org/a.git", join(targetRoot, "a"), {
      signal: undefined,
      timeoutMs: undefined
    });
    expect(transport.setPathFilters).toHaveBeenCalledWith(
      join(targetRoot, "a"),
      ["/README.md", "/src/", "/src/*"],
      expect.anything()
    );
    expect(result.repositories).toEqual([
      { name: "a", path: join(targetRoot, "a"), materialized: true, hasCommitHistory: false },
      { name: "b", path: join(targetRoot, "b"), materialized: true, hasCommitHistory: false }
    ]);
  });

  it("skips a descriptor whose directory already exists", async () => {
    const { transport } = createFakeTransport();
    await mkdir(join(targetRoot, "a"), { recursive: true });
    await writeFile(join(targetRoot, "a", "notes.txt"), "keep me");

    const result = await fetchAll(
      createDescriptors(["host:org/a.git", "host:org/b.git"]),
      targetRoot,
      ["README.md", "src/"],
      transport
    );

    expect(result.outcomes[0]).toEqual({
      status: "skipped",
      name: "a",
      path: join(targetRoot, "a"),
      reason: "already exists"
    });
    expect(result.outcomes[1].status).toBe("success");
    expect(exitCodeFor(result.summary)).toBe(0);
    expect(transport.cloneMetadataOnly).toHaveBeenCalledTimes(1);
    expect(await readdir(join(targetRoot, "a"))).toEqual(["notes.txt"]);
  });

  it("keeps going after a clone failure and reports exit code 1", async () => {
    const { transport } = createFakeTransport({ failClone: ["host:org/b.git"] });

    const result = await fetchAll(
      createDescriptors(["host:org/a.git", "host:org/b.git"]),
      targetRoot,
      ["README.md", "src/"],
      transport
    );

    expect(result.outcomes[0].status).toBe("success");
    expect(result.outcomes[1]).toEqual({
      status: "failed",
      name: "b",
      path: join(targetRoot, "b"),
      reason: "clone error",
      error: "fatal: could not read from remote repository"
    });
    expect(exitCodeFor(result.summary)).toBe(1);
    expect(await readdir(targetRoot)).toEqual(["a"]);
    expect(await readFile(join(targetRoot, "a", "README.md"), "utf8")).toBe("# a\n");
    expect(transport.setPathFilters).toHaveBeenCalledTimes(1);
  });

  it("produces outcomes for every descriptor after an early failure", async () => {
    const { transport } = createFakeTransport({ failClone: ["host:org/a.git"] });

    const result = await fetchAll(
      createDescriptors(["host:org/a.git", "host:org/b.git", "host:org/c.git"]),
      targetRoot,
      ["src/"],
      transport
    );

    expect(result.outcomes.map((outcome) => `${outcome.name}:${outcome.status}`)).toEqual([
      "a:failed",
      "b:success",
      "c:success"
    ]);
    expect(result.summary).toEqual({ total: 3, succeeded: 2, failed: 1, skipped: 0 });
  });

  it("skips every previously fetched descriptor on a second run without touching it", async () => {
    const { transport } = createFakeTransport();
    const descriptors = createDescriptors(["host:org/a.git", "host:org/b.git"]);

    await fetchAll(descriptors, targetRoot, ["README.md", "src/"], transport);
    await writeFile(join(targetRoot, "a", "README.md"), "edited locally\n");
    const second = await fetchAll(descriptors, targetRoot, ["README.md", "src/"], transport);

    expect(second.outcomes.map((outcome) => outcome.status)).toEqual(["skipped", "skipped"]);
    expect(second.summary).toEqual({ total: 2, succeeded: 0, failed: 0, skipped: 2 });
    expect(transport.cloneMetadataOnly).toHaveBeenCalledTimes(2);
    expect(transport.materialize).toHaveBeenCalledTimes(2);
    expect(await readFile(join(targetRoot, "a", "README.md"), "utf8")).toBe("edited locally\n");
  });

  it("leaves the repository shell on disk when checkout fails", async () => {
    const { transport } = createFakeTransport({ failCheckout: ["a"] });

    const result = await fetchAll(createDescriptors(["host:org/a.git"]), targetRoot, ["README.md"], transport);

    expect(result.outcomes[0]).toMatchObject({ status: "failed", reason: "checkout error" });
    expect(await readdir(join(targetRoot, "a"))).toEqual([".git"]);
    expect(result.repositories).toEqual([]);
  });

  it("reports path-filter failures without running checkout", async () => {
    const { transport } = createFakeTransport({ failFilter: ["a"] });

    const result = await fetchAll(createDescriptors(["host:org/a.git"]), targetRoot, ["src/"], transport);

    expect(result.outcomes[0]).toMatchObject({
      status: "failed",
      reason: "filter error",
      error: "sparse-checkout rejected"
    });
    expect(transport.materialize).not.toHaveBeenCalled();
  });

  it("treats a repeated derived name in the same run as already present", async () => {
    const { transport } = createFakeTransport();

    const result = await fetchAll(
      createDescriptors(["host:org/a.git", "mirror:team/a.git"]),
      targetRoot,
      ["src/"],
      transport
    );

    expect(result.outcomes.map((outcome) => outcome.status)).toEqual(["success", "skipped"]);
    expect(result.outcomes[1]).toMatchObject({ reason: "already exists" });
    expect(transport.cloneMetadataOnly).toHaveBeenCalledTimes(1);
  });

  it("retries a transient clone failure", async () => {
    const { transport } = createFakeTransport();
    transport.cloneMetadataOnly.mockResolvedValueOnce({ ok: false, message: "connection reset" });
    const sleep = vi.fn().mockResolvedValue(undefined);
    const events: FetchEvent[] = [];

    const result = await fetchAll(createDescriptors(["host:org/a.git"]), targetRoot, ["src/"], transport, {
      retryPolicy: { attempts: 2, delayMs: 5 },
      sleep,
      onEvent: (event) => events.push(event)
    });

    expect(result.outcomes[0].status).toBe("success");
    expect(transport.cloneMetadataOnly).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(5, undefined);
    expect(events.map((event) => event.type)).toEqual(["repo:start", "repo:retry", "repo:outcome"]);
    expect(events[1]).toEqual({
      type: "repo:retry",
      name: "a",
      step: "clone",
      attempt: 1,
      nextAttempt: 2,
      error: "connection reset"
    });
  });

  it("uses a plain clone in full mode", async () => {
    const { transport } = createFakeTransport();

    const result = await fetchAll(createDescriptors(["host:org/a.git"]), targetRoot, [], transport, { mode: "full" });

    expect(result.outcomes[0]).toEqual({ status: "success", name: "a", path: join(targetRoot, "a"), detail: "full clone" });
    expect(transport.cloneFull).toHaveBeenCalledTimes(1);
    expect(transport.cloneMetadataOnly).not.toHaveBeenCalled();
    expect(transport.setPathFilters).not.toHaveBeenCalled();
  });

  it("keeps descriptor order when fetching concurrently", async () => {
    const { transport, maxInFlight } = createFakeTransport({ cloneDelayMs: { a: 30, b: 10 } });

    const result = await fetchAll(
      createDescriptors(["host:org/a.git", "host:org/b.git", "host:org/c.git"]),
      targetRoot,
      ["src/"],
      transport,
      { concurrency: 2 }
    );

    expect(result.outcomes.map((outcome) => outcome.name)).toEqual(["a", "b", "c"]);
    expect(result.repositories.map((repo) => repo.name)).toEqual(["a", "b", "c"]);
    expect(maxInFlight()).toBe(2);
  });

  it("reports completed outcomes and skips the rest when cancelled", async () => {
    const controller = new AbortController();
    const { transport } = createFakeTransport();
    transport.cloneMetadataOnly.mockImplementationOnce(async () => {
      controller.abort();
      return { ok: false, message: "Command aborted: git clone" };
    });

    const result = await fetchAll(
      createDescriptors(["host:org/a.git", "host:org/b.git"]),
      targetRoot,
      ["src/"],
      transport,
      { signal: controller.signal, retryPolicy: { attempts: 3 } }
    );

    expect(result.outcomes).toEqual([
      {
        status: "failed",
        name: "a",
        path: join(targetRoot, "a"),
        reason: "clone error",
        error: "Command aborted: git clone"
      },
      { status: "skipped", name: "b", path: join(targetRoot, "b"), reason: "cancelled" }
    ]);
    expect(transport.cloneMetadataOnly).toHaveBeenCalledTimes(1);
  });

  it("uses an injected presence check", async () => {
    const { transport } = createFakeTransport();
    const isMaterialized = vi.fn().mockResolvedValue(true);

    const result = await fetchAll(createDescriptors(["host:org/a.git"]), targetRoot, ["src/"], transport, {
      isMaterialized
    });

    expect(result.outcomes[0]).toMatchObject({ status: "skipped", reason: "already exists" });
    expect(isMaterialized).toHaveBeenCalledWith(join(targetRoot, "a"), {
      identifier: "host:org/a.git",
      derivedName: "a"
    });
    expect(transport.cloneMetadataOnly).not.toHaveBeenCalled();
  });

  it("fails before any descriptor when the target root cannot be created", async () => {
    const { transport } = createFakeTransport();
    await mkdir(join(targetRoot, ".."), { recursive: true });
    const blocker = join(targetRoot, "..", "blocker");
    await writeFile(blocker, "not a directory");

    await expect(
      fetchAll(createDescriptors(["host:org/a.git"]), join(blocker, "repos"), ["src/"], transport)
    ).rejects.toMatchObject({ name: "FleetError", kind: "root_unavailable" });
    expect(transport.cloneMetadataOnly).not.toHaveBeenCalled();
  });

  it("rejects a sparse fetch without path filters", async () => {
    const { transport } = createFakeTransport();

    await expect(fetchAll(createDescriptors(["host:org/a.git"]), targetRoot, ["  "], transport)).rejects.toMatchObject({
      kind: "invalid_config"
    });
  });

  it("returns an empty report for an empty descriptor list", async () => {
    const { transport } = createFakeTransport();

    const result = await fetchAll([], targetRoot, ["src/"], transport);

    expect(result.summary).toEqual({ total: 0, succeeded: 0, failed: 0, skipped: 0 });
    expect(await readdir(targetRoot)).toEqual([]);
  });
});
