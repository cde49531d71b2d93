/**
 * Unit tests for building runtime objects from configuration
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  ConfigError,
  buildSearchEngine,
  buildSources,
  parseConfig,
  selectSources,
  type DocstreamConfig,
} from "../../../src/config/index.js";
import {
  FileSystemSource,
  GitRepositorySource,
  StaticSource,
  type DocumentSource,
} from "../../../src/ingestion/index.js";
import type { Document } from "../../../src/documents/index.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { MockGitHubGraphQL, starredPage } from "../../helpers/github-graphql-mock.js";
import { MockSimpleGit } from "../../helpers/simple-git-mock.js";
import { drain } from "../../helpers/streams.js";

function fetchAll(source: DocumentSource | undefined): Promise<{ items: Document[]; error?: unknown }> {
  if (!source) {
    throw new Error("source was not built");
  }
  return drain(source.fetch());
}

describe("config factory", () => {
  let dir: string;

  beforeEach(async () => {
    initializeLogger({ level: "silent", format: "json" });
    dir = await mkdtemp(join(tmpdir(), "config-factory-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
    resetLogger();
  });

  function config(raw: unknown): DocstreamConfig {
    return parseConfig(raw, dir);
  }

  const threeSources = {
    sources: [
      { source: "fs", id: "notes", paths: ["notes"], include: ["\\.md$"] },
      { source: "static", id: "faq", documents: [{ id: "1", title: "Hours", link: "faq#1", content: "Nine to five" }] },
      { source: "github", id: "handbook", repositories: { from: "list", list: [{ name: "acme/handbook" }] } },
    ],
  };

  describe("buildSources", () => {
    test("should build one source per entry in configuration order", async () => {
      const sources = await buildSources(config(threeSources));

      expect(sources.map((source) => source.id)).toEqual(["notes", "faq", "handbook"]);
      expect(sources[0]).toBeInstanceOf(FileSystemSource);
      expect(sources[1]).toBeInstanceOf(StaticSource);
      expect(sources[2]).toBeInstanceOf(GitRepositorySource);
    });

    test("should stamp static documents with their source id", async () => {
      const [, faq] = await buildSources(config(threeSources));

      const { items, error } = await fetchAll(faq);

      expect(error).toBeUndefined();
      expect(items).toEqual([
        { id: "1", source: "faq", title: "Hours", link: "faq#1", content: "Nine to five", metadata: {} },
      ]);
    });

    test("should apply filters to filesystem sources", async () => {
      await writeFile(join(dir, "keep.md"), "kept");
      await writeFile(join(dir, "skip.txt"), "skipped");
      const [notes] = await buildSources(
        config({ sources: [{ source: "fs", id: "notes", paths: ["."], include: ["\\.md$"] }] })
      );

      const { items } = await fetchAll(notes);

      expect(items.map((doc) => doc.title)).toEqual(["keep.md"]);
    });

    test("should clone listed repositories with the mock git client", async () => {
      const git = new MockSimpleGit();
      git.setRepository("git@github.com:acme/handbook.git", { "guide.md": "Read me" });
      const sources = await buildSources(config(threeSources), { git, tempRoot: dir });

      const { items, error } = await fetchAll(sources[2]);

      expect(error).toBeUndefined();
      expect(items.map((doc) => doc.id)).toEqual(["acme/handbook/guide.md"]);
      expect(git.calls.map((call) => call.url)).toEqual(["git@github.com:acme/handbook.git"]);
    });

    test("should wrap invalid patterns with the source id", async () => {
      const error = await buildSources(
        config({ sources: [{ source: "fs", id: "notes", paths: ["."], exclude: ["("] }] })
      ).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toHaveProperty("message", expect.stringMatching(/^Source 'notes': Invalid exclude pattern '\('/));
    });

    describe("GitHub API repositories", () => {
      let api: MockGitHubGraphQL;

      beforeEach(() => {
        api = new MockGitHubGraphQL();
        api.enqueue({ body: starredPage([], null, false) });
      });

      function apiConfig(repositories: Record<string, unknown>): DocstreamConfig {
        return config({
          sources: [{ source: "github", id: "stars", repositories: { from: "api", starredBy: ["octocat"], ...repositories } }],
        });
      }

      test("should prefer the token file over the environment token", async () => {
        await writeFile(join(dir, "token"), "test-secret\n");
        const [stars] = await buildSources(apiConfig({ tokenFile: "token" }), {
          environment: { githubToken: "env-secret" },
          fetch: api.fetch,
        });

        await fetchAll(stars);

        expect(api.calls[0]?.headers["Authorization"]).toBe("Bearer test-secret");
        expect(api.calls[0]?.variables).toEqual({ login: "octocat", first: 50, after: null });
      });

      test("should fall back to the environment token", async () => {
        const [stars] = await buildSources(apiConfig({}), { environment: { githubToken: "env-secret" }, fetch: api.fetch });

        await fetchAll(stars);

        expect(api.calls[0]?.headers["Authorization"]).toBe("Bearer env-secret");
      });

      test("should reject an empty token file", async () => {
        await writeFile(join(dir, "token"), "  \n");

        await expect(buildSources(apiConfig({ tokenFile: "token" }))).rejects.toThrow(
          `Source 'stars': token file ${join(dir, "token")} is empty`
        );
      });

      test("should reject a missing token file", async () => {
        await expect(buildSources(apiConfig({ tokenFile: "absent" }))).rejects.toThrow(
          `Source 'stars': cannot read token file ${join(dir, "absent")}`
        );
      });

      test("should turn lister validation errors into config errors", async () => {
        const error = await buildSources(apiConfig({ starredBy: ["-bad-"] })).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ConfigError);
        expect(error).toHaveProperty("message", "Source 'stars': Invalid GitHub lister configuration");
        expect(error).toHaveProperty("issues", ["targets.0.login: Invalid GitHub username"]);
      });
    });
  });

  describe("selectSources", () => {
    test("should keep configuration order", () => {
      const selected = selectSources(config(threeSources), ["handbook", "notes"]);

      expect(selected.sources.map((source) => source.id)).toEqual(["notes", "handbook"]);
    });

    test("should keep everything for an empty selection", () => {
      const all = config(threeSources);

      expect(selectSources(all, [])).toBe(all);
    });

    test("should reject unknown ids", () => {
      expect(() => selectSources(config(threeSources), ["nope"])).toThrow(
        "Unknown source 'nope'. Configured sources: notes, faq, handbook"
      );
    });
  });

  describe("buildSearchEngine", () => {
    test("should open the configured index", async () => {
      const engine = await buildSearchEngine(
        config({ sources: threeSources.sources, engine: { use: "sqlite", path: "index" } })
      );
      try {
        await engine.index([
          { id: "1", source: "faq", title: "Hours", link: "faq#1", content: "Nine to five", metadata: {} },
        ]);

        const results = await engine.search("hours").collect();

        expect(results.map((item) => item.id)).toEqual(["1"]);
      } finally {
        await engine.close();
      }
    });
  });
});
