import { describe, it, expect, vi, afterEach } from "vitest";
import { createCircuitBreaker, isCircuitOpenError } from "../../src/utils/resilience.js";

describe("createCircuitBreaker", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("should pass results through while closed", async () => {
    const breaker = createCircuitBreaker("test-service");

    await expect(breaker.execute(async () => "ok")).resolves.toBe("ok");
  });

  it("should open after consecutive failures", async () => {
    const breaker = createCircuitBreaker("test-service", {
      failureThreshold: 2,
      cooldownMs: 60000
    });
    const fail = async (): Promise<string> => {
      throw new Error("boom");
    };

    await expect(breaker.execute(fail)).rejects.toThrow("boom");
    await expect(breaker.execute(fail)).rejects.toThrow("boom");

    const error = await breaker.execute(async () => "ok").catch((e: unknown) => e);
    expect(isCircuitOpenError(error)).toBe(true);
  });

  it("should log a warning naming the service when the circuit opens", async () => {
    vi.stubEnv("LOG_LEVEL", "info");
    const consoleSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const breaker = createCircuitBreaker("page-fetch", { failureThreshold: 1, cooldownMs: 60000 });

    await breaker.execute(async () => {
      throw new Error("boom");
    }).catch(() => undefined);

    expect(consoleSpy).toHaveBeenCalledTimes(1);
    const [prefix, message, data] = consoleSpy.mock.calls[0];
    expect(String(prefix)).toContain("[WARN] [resilience]");
    expect(message).toBe("Circuit opened for page-fetch");
    expect(JSON.parse(String(data))).toEqual({
      service: "page-fetch",
      state: "Open",
      cooldownMs: 60000
    });
  });
});

describe("isCircuitOpenError", () => {
  it("should not flag ordinary errors", () => {
    expect(isCircuitOpenError(new Error("circuit open"))).toBe(false);
    expect(isCircuitOpenError("broken")).toBe(false);
  });
});
