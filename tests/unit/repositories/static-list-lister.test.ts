/**
 * Unit tests for StaticListLister
 */

import { describe, test, expect } from "vitest";
import { StaticListLister, buildCloneUrl } from "../../../src/repositories/static-list-lister.js";
import { drain } from "../../helpers/streams.js";

describe("buildCloneUrl", () => {
  test("should default to ssh on github.com", () => {
    expect(buildCloneUrl("acme/handbook")).toBe("git@github.com:acme/handbook.git");
  });

  test("should build https URLs on a custom server", () => {
    expect(buildCloneUrl("team/wiki", { server: "git.example.com", transport: "https" })).toBe(
      "https://git.example.com/team/wiki.git"
    );
  });
});

describe("StaticListLister", () => {
  test("should replay descriptors in declaration order", async () => {
    const lister = new StaticListLister([
      { name: "b/two", cloneUrl: "https://example.com/b/two.git" },
      { name: "a/one", cloneUrl: "https://example.com/a/one.git" },
    ]);

    const { items } = await drain(lister.list());

    expect(items.map((repo) => repo.name)).toEqual(["b/two", "a/one"]);
  });

  test("should build descriptors from references", async () => {
    const lister = StaticListLister.fromReferences([{ name: "acme/handbook", branch: "main" }, { name: "acme/api" }], {
      transport: "https",
    });

    const { items } = await drain(lister.list());

    expect(items).toEqual([
      { name: "acme/handbook", cloneUrl: "https://github.com/acme/handbook.git", branch: "main" },
      { name: "acme/api", cloneUrl: "https://github.com/acme/api.git" },
    ]);
  });

  test("should yield nothing for an empty list", async () => {
    await expect(drain(new StaticListLister([]).list())).resolves.toEqual({ items: [] });
  });
});
