import { describe, it, expect, vi, afterEach } from "vitest";
import { createServer, type Server } from "node:http";
import type { Socket } from "node:net";
import { setTimeout as sleep } from "node:timers/promises";
import {
  companyFromTitle,
  extractCompanyFromHtml,
  fetchCompanyFromPage
} from "../../src/extraction/page-extractor.js";

const JOB_URL = "https://example.com/jobs/123";

function page(head: string, body = ""): string {
  return `<!doctype html><html><head>${head}</head><body>${body}</body></html>`;
}

function jsonLd(value: unknown): string {
  return `<script type="application/ld+json">${JSON.stringify(value)}</script>`;
}

describe("companyFromTitle", () => {
  it("should take the part after the last ' at '", () => {
    expect(companyFromTitle("Data Engineer at Acme Widgets - Indeed")).toBe("Acme Widgets");
  });

  it("should strip pipe suffixes", () => {
    expect(companyFromTitle("Software Engineer at Monzo | Jobs")).toBe("Monzo");
    expect(companyFromTitle("Acme Widgets | Careers")).toBe("Acme Widgets");
  });

  it("should strip job board suffixes", () => {
    expect(companyFromTitle("Northwind Analytics - LinkedIn")).toBe("Northwind Analytics");
  });

  it("should return null for a blank title", () => {
    expect(companyFromTitle("   ")).toBeNull();
  });
});

describe("extractCompanyFromHtml", () => {
  it("should prefer a data-company-name attribute", () => {
    const html = page(
      "<title>Engineer at Other Co</title>",
      '<div data-company-name=" Acme Widgets ">Apply</div>'
    );

    expect(extractCompanyFromHtml(html, JOB_URL)).toBe("Acme Widgets");
  });

  it("should read hiringOrganization from JSON-LD", () => {
    const html = page(
      jsonLd({
        "@type": "JobPosting",
        title: "Engineer",
        hiringOrganization: { "@type": "Organization", name: "Northwind Analytics" }
      }) + "<title>Engineer at Other Co</title>"
    );

    expect(extractCompanyFromHtml(html, JOB_URL)).toBe("Northwind Analytics");
  });

  it("should read the top-level JSON-LD name on job URLs", () => {
    const html = page(jsonLd({ "@type": "Organization", name: "Globex" }));

    expect(extractCompanyFromHtml(html, JOB_URL)).toBe("Globex");
  });

  it("should ignore the top-level JSON-LD name on other URLs", () => {
    const html = page(
      jsonLd({ "@type": "Organization", name: "Globex" }) +
        "<title>Careers at Initech</title>"
    );

    expect(extractCompanyFromHtml(html, "https://example.com/about")).toBe("Initech");
  });

  it("should fall back to the title when JSON-LD is invalid", () => {
    const html = page(
      '<script type="application/ld+json">{not json</script>' +
        "<title>Data Engineer at Acme Widgets - Indeed</title>"
    );

    expect(extractCompanyFromHtml(html, JOB_URL)).toBe("Acme Widgets");
  });

  it("should return null when the page names no company", () => {
    expect(extractCompanyFromHtml(page(""), JOB_URL)).toBeNull();
  });
});

describe("fetchCompanyFromPage", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should fetch the page and extract the company", async () => {
    const fetchMock = vi.fn(
      async () =>
        new Response(page("<title>Engineer at Acme Widgets - Indeed</title>"), {
          status: 200
        })
    );
    vi.stubGlobal("fetch", fetchMock);

    const company = await fetchCompanyFromPage(JOB_URL, { retries: 0 });

    expect(company).toBe("Acme Widgets");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(JOB_URL, {
      headers: { "User-Agent": expect.any(String) },
      signal: expect.any(AbortSignal)
    });
  });

  it("should return null for an HTTP error without retrying", async () => {
    const fetchMock = vi.fn(async () => new Response("Not found", { status: 404 }));
    vi.stubGlobal("fetch", fetchMock);

    const company = await fetchCompanyFromPage(JOB_URL, { retries: 2 });

    expect(company).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should return null when the request fails", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );

    await expect(fetchCompanyFromPage(JOB_URL, { retries: 0 })).resolves.toBeNull();
  });

  describe("against a server that never responds", () => {
    let server: Server | undefined;
    const sockets = new Set<Socket>();

    afterEach(async () => {
      for (const socket of sockets) socket.destroy();
      sockets.clear();
      await new Promise<void>((resolve) => {
        if (server) server.close(() => resolve());
        else resolve();
      });
      server = undefined;
    });

    async function startHangingServer(): Promise<string> {
      const hanging = createServer(() => {
        // never respond
      });
      hanging.on("connection", (socket) => {
        sockets.add(socket);
        socket.on("close", () => sockets.delete(socket));
      });
      await new Promise<void>((resolve) => hanging.listen(0, "127.0.0.1", resolve));
      server = hanging;
      const address = hanging.address();
      if (address === null || typeof address === "string") {
        throw new Error("Server is not listening on a TCP port");
      }
      return `http://127.0.0.1:${address.port}/jobs/1`;
    }

    it("should close the connection once the request times out", async () => {
      const url = await startHangingServer();

      const company = await fetchCompanyFromPage(url, { timeoutMs: 100, retries: 0 });
      await sleep(300);

      expect(company).toBeNull();
      expect(sockets.size).toBe(0);
    });
  });
});
