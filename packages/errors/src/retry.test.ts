import { describe, it, expect, vi, beforeEach } from "vitest";
import { withRetry } from "./retry.js";
import {
  EmptyCorpusError,
  ExternalServiceError,
  RetrievalEmptyError,
  SourceUnavailableError,
  TimeoutError,
  ValidationError,
} from "./errors.js";

describe("withRetry", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    // Suppress console.warn from retry logic
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("returns result on success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");

    const result = await withRetry(fn);

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries on failure and returns on eventual success", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("transient")).mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("throws after maxRetries exhausted", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("persistent"));

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1 })).rejects.toThrow(
      "persistent",
    );

    expect(fn).toHaveBeenCalledTimes(3); // 1 initial + 2 retries
  });

  it.each([
    ["validation", new ValidationError("Invalid topK", { topK: "must be a positive integer" })],
    ["empty retrieval", new RetrievalEmptyError()],
    ["empty corpus", new EmptyCorpusError()],
  ])("does not retry %s errors", async (_label, error) => {
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toBe(error);

    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries timeouts when only TIMEOUT is retryable", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new TimeoutError("download p1", 50))
      .mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1, retryableErrors: ["TIMEOUT"] });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("retries external service failures when no codes are listed", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new ExternalServiceError("Embedding request failed: 500", "http"))
      .mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("retries non-AppError errors (network failures)", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("ECONNREFUSED")).mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("treats unlisted codes as final", async () => {
    const fn = vi
      .fn()
      .mockRejectedValue(new SourceUnavailableError("Download failed: 503", "p1"));

    await expect(
      withRetry(fn, {
        maxRetries: 2,
        baseDelayMs: 1,
        retryableErrors: ["TIMEOUT"],
      }),
    ).rejects.toThrow("Download failed: 503");

    expect(fn).toHaveBeenCalledOnce();
  });

  it("reports each retry through onRetry", async () => {
    const onRetry = vi.fn();
    const error = new Error("transient");
    const fn = vi.fn().mockRejectedValueOnce(error).mockResolvedValue("ok");

    await withRetry(fn, { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1, onRetry });

    expect(onRetry).toHaveBeenCalledOnce();
    expect(onRetry).toHaveBeenCalledWith({ attempt: 1, maxRetries: 2, delayMs: 0, error });
  });

  it("retries plain errors whose code is listed", async () => {
    const timeout = Object.assign(new Error("socket timeout"), { code: "TIMEOUT" });
    const fn = vi.fn().mockRejectedValueOnce(timeout).mockResolvedValue("ok");

    const result = await withRetry(fn, {
      baseDelayMs: 1,
      maxDelayMs: 1,
      retryableErrors: ["TIMEOUT"],
    });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("uses exponential backoff (delay increases)", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("fail"));
    const start = Date.now();

    await expect(
      withRetry(fn, { maxRetries: 2, baseDelayMs: 10, maxDelayMs: 100 }),
    ).rejects.toThrow("fail");

    const elapsed = Date.now() - start;
    // Should have some delay from backoff (at least ~10ms + ~20ms with jitter)
    expect(elapsed).toBeGreaterThan(5);
  });
});
