import { describe, it, expect, vi, beforeEach } from "vitest";
import { isRetryableError, withRetry } from "../../src/utils/retry.js";
import { OperationTimeoutError } from "../../src/utils/timeout.js";

describe("isRetryableError", () => {
  describe("structured error properties", () => {
    it("should retry rate limits and gateway errors", () => {
      for (const status of [429, 502, 503, 504]) {
        const error = Object.assign(new Error("Request failed"), { status });
        expect(isRetryableError(error)).toBe(true);
      }
    });

    it("should not retry other client errors", () => {
      for (const status of [400, 401, 403, 404]) {
        const error = Object.assign(new Error("Request failed"), { status });
        expect(isRetryableError(error)).toBe(false);
      }
    });

    it("should not retry a 404 even when the message looks transient", () => {
      const error = Object.assign(new Error("Network timeout on 404 page"), { status: 404 });
      expect(isRetryableError(error)).toBe(false);
    });

    it("should retry transient Node.js error codes", () => {
      for (const code of ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "EPIPE", "ECONNREFUSED", "EAI_AGAIN"]) {
        const error = Object.assign(new Error("Socket error"), { code });
        expect(isRetryableError(error)).toBe(true);
      }
    });

    it("should not retry a missing file", () => {
      const error = Object.assign(new Error("no such file"), { code: "ENOENT" });
      expect(isRetryableError(error)).toBe(false);
    });
  });

  describe("message-based fallback", () => {
    it("should detect timeouts in the message", () => {
      expect(isRetryableError(new Error("Request timeout"))).toBe(true);
      expect(isRetryableError(new OperationTimeoutError(100, "page-fetch"))).toBe(true);
    });

    it("should detect rate limits in the message", () => {
      expect(isRetryableError(new Error("Rate limit exceeded"))).toBe(true);
      expect(isRetryableError(new Error("Too many requests"))).toBe(true);
      expect(isRetryableError(new Error("Error 429"))).toBe(true);
    });

    it("should detect network errors in the message", () => {
      expect(isRetryableError(new Error("Network error"))).toBe(true);
    });

    it("should not retry generic errors", () => {
      expect(isRetryableError(new Error("Something went wrong"))).toBe(false);
      expect(isRetryableError(new Error("Invalid input"))).toBe(false);
    });

    it("should not retry non-Error values", () => {
      expect(isRetryableError("string error")).toBe(false);
      expect(isRetryableError({ message: "timeout" })).toBe(false);
      expect(isRetryableError(null)).toBe(false);
      expect(isRetryableError(undefined)).toBe(false);
    });
  });
});

describe("withRetry", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should return the result on first success", async () => {
    const fn = vi.fn().mockResolvedValue("success");

    const result = await withRetry(fn, { retries: 3 });

    expect(result).toBe("success");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should retry on retryable errors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("timeout"))
      .mockResolvedValue("success");

    const result = await withRetry(fn, { retries: 3, minDelayMs: 10, maxDelayMs: 10 });

    expect(result).toBe("success");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should abort immediately on non-retryable errors", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("Invalid input"));

    await expect(withRetry(fn, { retries: 3, minDelayMs: 10 })).rejects.toThrow("Invalid input");

    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should rethrow the original non-retryable error", async () => {
    const original = Object.assign(new Error("Unauthorized"), { status: 401 });
    const fn = vi.fn().mockRejectedValue(original);

    const error = await withRetry(fn, { retries: 3, minDelayMs: 10 }).catch((e: unknown) => e);

    expect(error).toBe(original);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should throw after retries are exhausted", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("timeout"));

    await expect(
      withRetry(fn, { retries: 2, minDelayMs: 10, maxDelayMs: 10 })
    ).rejects.toThrow("timeout");

    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("should log retries with the correlation ID", async () => {
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("timeout"))
      .mockResolvedValue("success");

    await withRetry(fn, {
      retries: 3,
      minDelayMs: 10,
      maxDelayMs: 10,
      correlationId: "test-123",
      operation: "page-fetch"
    });

    const logCalls = consoleSpy.mock.calls.flat().join(" ");
    expect(logCalls).toContain("test-123");
    expect(logCalls).toContain("Retry attempt failed");

    consoleSpy.mockRestore();
  });
});
