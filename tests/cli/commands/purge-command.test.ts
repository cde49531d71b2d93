/**
 * Tests for Purge Command
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from "vitest";
import { purgeCommand } from "../../../src/cli/commands/purge-command.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { MockSearchEngine } from "../../helpers/search-engine-mock.js";
import { createTestDependencies, printedLines } from "../../helpers/cli-deps.js";

describe("Purge Command", () => {
  let engine: MockSearchEngine;
  let consoleLogSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    initializeLogger({ level: "silent", format: "json" });
    engine = new MockSearchEngine();
    await engine.index([
      { id: "1", source: "faq", title: "Hours", link: "faq#1", content: "Open", metadata: {} },
      { id: "2", source: "faq", title: "Parking", link: "faq#2", content: "Behind", metadata: {} },
      { id: "todo", source: "notes", title: "Todo", link: "notes/todo", content: "Water", metadata: {} },
    ]);
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  it("should remove only the named source", async () => {
    const removed = await purgeCommand({ source: "faq" }, createTestDependencies(engine));

    expect(removed).toBe(2);
    expect(engine.documents.map((doc) => doc.id)).toEqual(["todo"]);
    expect(printedLines(consoleLogSpy.mock.calls)).toEqual(["✓ Removed 2 documents from source 'faq'"]);
  });

  it("should remove everything without a source", async () => {
    await purgeCommand({ source: "faq" }, createTestDependencies(engine));
    consoleLogSpy.mockClear();

    const removed = await purgeCommand({}, createTestDependencies(engine));

    expect(removed).toBe(1);
    expect(engine.documents).toEqual([]);
    expect(printedLines(consoleLogSpy.mock.calls)).toEqual(["✓ Removed 1 document"]);
  });
});
