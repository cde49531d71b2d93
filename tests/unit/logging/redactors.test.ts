/**
 * Unit tests for secret redaction
 */

import { describe, test, expect, afterEach } from "vitest";
import {
  REDACT_OPTIONS,
  REDACT_PATHS,
  looksLikeSecret,
  sanitizeError,
  initializeLogger,
  getComponentLogger,
  resetLogger,
} from "../../../src/logging/index.js";
import { createLogCapture } from "../../helpers/log-capture.js";

describe("Secret Redaction", () => {
  afterEach(() => {
    resetLogger();
  });

  test("should redact tokens at the top level and one level deep", () => {
    const capture = createLogCapture();
    initializeLogger({ level: "info", format: "json", stream: capture.stream });

    getComponentLogger("test").info(
      { token: "test-secret", github: { token: "test-secret", login: "someone" } },
      "Configured"
    );

    const [entry] = capture.getAll();
    expect(entry?.["token"]).toBe("[REDACTED]");
    expect(entry?.["github"]).toEqual({ token: "[REDACTED]", login: "someone" });
  });

  test("should redact authorization headers", () => {
    const capture = createLogCapture();
    initializeLogger({ level: "info", format: "json", stream: capture.stream });

    getComponentLogger("test").info({ headers: { authorization: "Bearer test-secret" } }, "Request");

    expect(capture.getAll()[0]?.["headers"]).toEqual({ authorization: "[REDACTED]" });
  });

  test("should expose redaction options built from the path list", () => {
    expect(REDACT_OPTIONS.paths).toBe(REDACT_PATHS);
    expect(REDACT_OPTIONS.censor).toBe("[REDACTED]");
    expect(REDACT_OPTIONS.remove).toBe(false);
  });

  describe("looksLikeSecret", () => {
    test("should flag GitHub-style tokens", () => {
      expect(looksLikeSecret(`ghp_${"a".repeat(36)}`)).toBe(true);
    });

    test("should not flag ordinary text", () => {
      expect(looksLikeSecret("hello world")).toBe(false);
      expect(looksLikeSecret("docs/readme.md")).toBe(false);
    });
  });

  describe("sanitizeError", () => {
    test("should flatten the cause chain", () => {
      const error = new Error("outer", { cause: new Error("inner") });

      const sanitized = sanitizeError(error);

      expect(sanitized["message"]).toBe("outer");
      expect(sanitized["cause"]).toMatchObject({ name: "Error", message: "inner" });
    });

    test("should mask extra properties that look like tokens", () => {
      const error = Object.assign(new Error("clone failed"), {
        detail: `ghp_${"a".repeat(36)}`,
        repository: "acme/handbook",
      });

      const sanitized = sanitizeError(error);

      expect(sanitized["detail"]).toBe("[REDACTED]");
      expect(sanitized["repository"]).toBe("acme/handbook");
    });

    test("should serialize logged errors", () => {
      const capture = createLogCapture();
      initializeLogger({ level: "info", format: "json", stream: capture.stream });
      const error = Object.assign(new Error("clone failed", { cause: new Error("auth") }), {
        detail: `ghp_${"b".repeat(40)}`,
      });

      getComponentLogger("test").error({ err: error }, "Failed");

      expect(capture.getAll()[0]?.["err"]).toMatchObject({
        name: "Error",
        message: "clone failed",
        detail: "[REDACTED]",
        cause: { name: "Error", message: "auth" },
      });
    });

    test("should keep non-error causes as they are", () => {
      const error = new Error("outer", { cause: "plain" });

      expect(sanitizeError(error)["cause"]).toBe("plain");
    });
  });
});
