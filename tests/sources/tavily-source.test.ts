import { describe, it, expect, vi, beforeEach } from "vitest";

const { invokeMock, toolConfigs } = vi.hoisted(() => {
  const toolConfigs: Array<Record<string, unknown>> = [];
  return {
    invokeMock: vi.fn<(config: Record<string, unknown>, input: { query: string }) => Promise<unknown>>(),
    toolConfigs
  };
});

vi.mock("@langchain/tavily", () => ({
  TavilySearch: class {
    constructor(private readonly config: Record<string, unknown>) {
      toolConfigs.push(config);
    }

    invoke(input: { query: string }): Promise<unknown> {
      return invokeMock(this.config, input);
    }
  }
}));

import { TavilyProfileSource } from "../../src/sources/tavily-source.js";
import { DataSourceError } from "../../src/data/errors.js";

function isLinkedinTool(config: Record<string, unknown>): boolean {
  return "includeDomains" in config;
}

describe("TavilyProfileSource", () => {
  beforeEach(() => {
    invokeMock.mockReset();
    toolConfigs.length = 0;
  });

  it("should be unavailable without an API key", async () => {
    const source = new TavilyProfileSource();

    expect(source.isAvailable()).toBe(false);
    await expect(source.lookup("Acme")).rejects.toThrow("Tavily API key not configured");
    expect(invokeMock).not.toHaveBeenCalled();
  });

  it("should find the LinkedIn company page and official website", async () => {
    invokeMock.mockImplementation(async (config) =>
      isLinkedinTool(config)
        ? {
            results: [
              { title: "Jane Doe | LinkedIn", url: "https://www.linkedin.com/in/jane-doe" },
              { title: "Acme Widgets | LinkedIn", url: "https://www.linkedin.com/company/acme-widgets" }
            ]
          }
        : { results: [{ title: "Acme Widgets", url: "https://acme-widgets.example.com" }] }
    );
    const source = new TavilyProfileSource({ apiKey: "test-secret", retries: 0 });

    const profile = await source.lookup("Acme Widgets Ltd", "test-correlation");

    expect(profile).toEqual({
      companyName: "Acme Widgets Ltd",
      linkedinUrl: "https://www.linkedin.com/company/acme-widgets",
      linkedinTitle: "Acme Widgets",
      indeedUrl: null,
      glassdoorUrl: null,
      glassdoorRating: null,
      websiteUrl: "https://acme-widgets.example.com"
    });
    expect(invokeMock).toHaveBeenCalledWith(expect.objectContaining({ includeDomains: ["linkedin.com"] }), {
      query: "Acme Widgets Ltd LinkedIn company UK"
    });
    expect(invokeMock).toHaveBeenCalledWith(
      expect.objectContaining({ excludeDomains: expect.arrayContaining(["linkedin.com", "glassdoor.com"]) }),
      { query: "Acme Widgets Ltd official website UK" }
    );
  });

  it("should reuse its search tools across lookups", async () => {
    invokeMock.mockResolvedValue({ results: [] });
    const source = new TavilyProfileSource({ apiKey: "test-secret", retries: 0 });

    await source.lookup("Acme");
    await source.lookup("Globex");

    expect(toolConfigs).toHaveLength(2);
    expect(toolConfigs.map((config) => config.tavilyApiKey)).toEqual(["test-secret", "test-secret"]);
    expect(invokeMock).toHaveBeenCalledTimes(4);
  });

  it("should return null when neither search finds anything", async () => {
    invokeMock.mockResolvedValue({ results: [] });
    const source = new TavilyProfileSource({ apiKey: "test-secret", retries: 0 });

    await expect(source.lookup("Acme")).resolves.toBeNull();
  });

  it("should treat an unexpected response shape as no results", async () => {
    invokeMock.mockResolvedValue("no results");
    const source = new TavilyProfileSource({ apiKey: "test-secret", retries: 0 });

    await expect(source.lookup("Acme")).resolves.toBeNull();
  });

  it("should wrap search failures in a DataSourceError", async () => {
    invokeMock.mockRejectedValue(new Error("Invalid API key"));
    const source = new TavilyProfileSource({ apiKey: "test-secret", retries: 0 });

    const error = await source.lookup("Acme").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DataSourceError);
    if (error instanceof DataSourceError) {
      expect(error.message).toBe("Tavily search failed: Invalid API key");
      expect(error.source).toBe("tavily");
      expect(error.isRetryable).toBe(false);
    }
  });

  it("should keep the HTTP status of a rejected search", async () => {
    invokeMock.mockRejectedValue(Object.assign(new Error("Unauthorized"), { status: 401 }));
    const source = new TavilyProfileSource({ apiKey: "test-secret", retries: 2 });

    const error = await source.lookup("Acme").catch((e: unknown) => e);

    expect(invokeMock).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(DataSourceError);
    if (error instanceof DataSourceError) {
      expect(error.statusCode).toBe(401);
      expect(error.isRetryable).toBe(false);
    }
  });
});
