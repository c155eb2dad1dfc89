import { describe, it, expect } from "vitest";
import { redactValue, REDACT_PATHS } from "./redactor.js";

describe("redactValue", () => {
  it("redacts sensitive keys entirely", () => {
    expect(redactValue("apiKey", "test-secret")).toBe("[REDACTED]");
    expect(redactValue("api_key", "test-secret")).toBe("[REDACTED]");
    expect(redactValue("x-api-key", "test-secret")).toBe("[REDACTED]");
    expect(redactValue("cohereApiKey", "test-secret")).toBe("[REDACTED]");
    expect(redactValue("authorization", "Bearer test-token")).toBe("[REDACTED]");
  });

  it("is case-insensitive for key matching", () => {
    expect(redactValue("APIKEY", "test-secret")).toBe("[REDACTED]");
    expect(redactValue("Authorization", "Bearer test-token")).toBe("[REDACTED]");
  });

  it("redacts e-mail addresses in string values", () => {
    expect(redactValue("text", "Correspondence: jane.doe@example.org, Dept. of Biology")).toBe(
      "Correspondence: [REDACTED], Dept. of Biology",
    );
  });

  it("redacts every e-mail address on repeated calls", () => {
    expect(redactValue("log", "From a@b.com to c@d.com")).toBe("From [REDACTED] to [REDACTED]");
    expect(redactValue("log", "again x@y.io")).toBe("again [REDACTED]");
  });

  it("leaves other values untouched", () => {
    expect(redactValue("title", "Protein folding")).toBe("Protein folding");
    expect(redactValue("count", 42)).toBe(42);
    expect(redactValue("data", null)).toBe(null);
  });
});

describe("REDACT_PATHS", () => {
  it("covers top-level and nested field paths", () => {
    expect(REDACT_PATHS).toContain("apiKey");
    expect(REDACT_PATHS).toContain("*.apiKey");
    expect(REDACT_PATHS).toContain("cohereApiKey");
    expect(REDACT_PATHS).toContain("*.cohereApiKey");
  });

  it("covers request header names", () => {
    expect(REDACT_PATHS).toContain('headers["x-api-key"]');
    expect(REDACT_PATHS).toContain('headers["authorization"]');
  });

  it("has a nested path for each top-level field", () => {
    const topLevel = REDACT_PATHS.filter((p) => /^\w+$/.test(p));
    for (const key of topLevel) {
      expect(REDACT_PATHS).toContain(`*.${key}`);
    }
  });
});
