/**
 * Unit tests for GitRepositorySource
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { GitRepositorySource } from "../../../src/ingestion/git-repository-source.js";
import { RepositoryCloner } from "../../../src/ingestion/repository-cloner.js";
import { PathFilter } from "../../../src/ingestion/path-filter.js";
import { AuthenticationError, RepositoryCloneError } from "../../../src/ingestion/errors.js";
import { StaticListLister } from "../../../src/repositories/static-list-lister.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { MockSimpleGit, MOCK_GIT_ERRORS } from "../../helpers/simple-git-mock.js";
import { drain } from "../../helpers/streams.js";

const HANDBOOK = "https://github.com/acme/handbook.git";
const API = "https://github.com/acme/api.git";
const PRIVATE = "https://github.com/acme/private.git";

describe("GitRepositorySource", () => {
  let tempRoot: string;
  let git: MockSimpleGit;

  beforeEach(async () => {
    initializeLogger({ level: "silent", format: "json" });
    tempRoot = await mkdtemp(join(tmpdir(), "docstream-git-test-"));
    git = new MockSimpleGit();
    git.setRepository(HANDBOOK, { "README.md": "# Handbook", "docs/onboarding.md": "Day one", "logo.png": "png" });
    git.setRepository(API, { "docs/endpoints.md": "GET /items" });
  });

  afterEach(async () => {
    await rm(tempRoot, { recursive: true, force: true });
    resetLogger();
  });

  function createSource(urls: Array<{ name: string; cloneUrl: string; branch?: string }>): GitRepositorySource {
    return new GitRepositorySource({
      sourceId: "work",
      lister: new StaticListLister(urls),
      cloner: new RepositoryCloner({}, git),
      filter: PathFilter.compile({ include: ["\\.md$"] }),
      tempRoot,
    });
  }

  test("should emit documents of every repository in lister order, keyed by repository", async () => {
    const source = createSource([
      { name: "acme/handbook", cloneUrl: HANDBOOK },
      { name: "acme/api", cloneUrl: API, branch: "main" },
    ]);

    const docs = await source.fetch().collect();

    expect(docs.slice(0, 2).map((doc) => doc.id).sort()).toEqual([
      "acme/handbook/README.md",
      "acme/handbook/docs/onboarding.md",
    ]);
    expect(docs[2]?.id).toBe("acme/api/docs/endpoints.md");
    expect(docs.find((doc) => doc.title === "onboarding.md")).toEqual({
      id: "acme/handbook/docs/onboarding.md",
      source: "work",
      title: "onboarding.md",
      link: "acme/handbook/docs/onboarding.md",
      content: "Day one",
      metadata: { repository: "acme/handbook", cloneUrl: HANDBOOK, path: "docs/onboarding.md" },
    });
    expect(git.calls.map((call) => call.options)).toEqual([
      ["--depth", "1"],
      ["--depth", "1", "--branch", "main"],
    ]);
  });

  test("should not emit version control metadata", async () => {
    const source = new GitRepositorySource({
      sourceId: "work",
      lister: new StaticListLister([{ name: "acme/handbook", cloneUrl: HANDBOOK }]),
      cloner: new RepositoryCloner({}, git),
      tempRoot,
    });

    const docs = await source.fetch().collect();

    expect(docs.map((doc) => doc.id).sort()).toEqual([
      "acme/handbook/README.md",
      "acme/handbook/docs/onboarding.md",
      "acme/handbook/logo.png",
    ]);
  });

  test("should fail the whole source when a later repository fails to clone", async () => {
    git.setShouldFailClone(MOCK_GIT_ERRORS.AUTH_FAILED, PRIVATE);
    const source = createSource([
      { name: "acme/handbook", cloneUrl: HANDBOOK },
      { name: "acme/private", cloneUrl: PRIVATE },
      { name: "acme/api", cloneUrl: API },
    ]);

    const { items, error } = await drain(source.fetch());

    expect(items.map((doc) => doc.id).sort()).toEqual(["acme/handbook/README.md", "acme/handbook/docs/onboarding.md"]);
    expect(error).toBeInstanceOf(RepositoryCloneError);
    expect(error).toHaveProperty("repository", "acme/private");
    expect(error).toHaveProperty("cause");
    expect(error instanceof RepositoryCloneError && error.cause).toBeInstanceOf(AuthenticationError);
    expect(git.calls.map((call) => call.url)).toEqual([HANDBOOK, PRIVATE]);
  });

  test("should remove every temp directory, on success and on failure", async () => {
    git.setShouldFailClone(MOCK_GIT_ERRORS.NETWORK, API);
    const source = createSource([
      { name: "acme/handbook", cloneUrl: HANDBOOK },
      { name: "acme/api", cloneUrl: API },
    ]);

    await drain(source.fetch());

    expect(git.calls).toHaveLength(2);
    await expect(readdir(tempRoot)).resolves.toEqual([]);
  });

  test("should clone each repository into its own directory", async () => {
    const source = createSource([
      { name: "acme/handbook", cloneUrl: HANDBOOK },
      { name: "acme/api", cloneUrl: API },
    ]);

    await source.fetch().collect();

    const [first, second] = git.calls;
    expect(first?.path).not.toBe(second?.path);
    expect(first?.path.startsWith(join(tempRoot, "docstream-"))).toBe(true);
  });

  test("should clean up when the consumer stops early", async () => {
    const source = createSource([
      { name: "acme/handbook", cloneUrl: HANDBOOK },
      { name: "acme/api", cloneUrl: API },
    ]);

    const stream = source.fetch();
    for await (const doc of stream) {
      expect(doc.id).toBe("acme/handbook/README.md");
      break;
    }
    await stream.completed;

    expect(git.calls).toHaveLength(1);
    await expect(readdir(tempRoot)).resolves.toEqual([]);
  });
});
