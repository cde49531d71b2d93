/**
 * Tests for CLI option schemas
 */

import { describe, it, expect } from "vitest";
import {
  GlobalOptionsSchema,
  IndexCommandOptionsSchema,
  PurgeCommandOptionsSchema,
  SearchCommandOptionsSchema,
  collect,
} from "../../../src/cli/utils/validation.js";

describe("CLI option schemas", () => {
  it("should default index sources to all", () => {
    expect(IndexCommandOptionsSchema.parse({})).toEqual({ source: [] });
    expect(IndexCommandOptionsSchema.parse({ source: [" notes "] })).toEqual({ source: ["notes"] });
  });

  it("should reject blank source ids", () => {
    expect(IndexCommandOptionsSchema.safeParse({ source: [""] }).success).toBe(false);
    expect(PurgeCommandOptionsSchema.safeParse({ source: "  " }).success).toBe(false);
  });

  it("should accept optional flags", () => {
    expect(SearchCommandOptionsSchema.parse({ json: true })).toEqual({ json: true });
    expect(PurgeCommandOptionsSchema.parse({})).toEqual({});
    expect(GlobalOptionsSchema.parse({ config: "docstream.json" })).toEqual({ config: "docstream.json" });
  });

  it("should collect repeated options in order", () => {
    expect(collect("b", collect("a", []))).toEqual(["a", "b"]);
  });
});
