import { describe, it, expect } from "vitest";
import { generateExternalLinks } from "../../src/formatting/external-links.js";

describe("generateExternalLinks", () => {
  it("should narrow location-aware links to the sponsor's location", () => {
    const links = generateExternalLinks("Acme & Co", "Leeds", "West Yorkshire");

    expect(links.locationUsed).toBe("Leeds, West Yorkshire");
    expect(links.indeedJobs).toBe(
      "https://uk.indeed.com/jobs?q=Acme%20%26%20Co&l=Leeds%2C%20West%20Yorkshire"
    );
    expect(links.google).toBe(
      "https://www.google.com/search?q=Acme%20%26%20Co%20Leeds%2C%20West%20Yorkshire%20UK"
    );
    expect(links.googleMaps).toBe(
      "https://www.google.com/maps/search/Acme%20%26%20Co%20Leeds%2C%20West%20Yorkshire"
    );
  });

  it("should encode the company name in every link", () => {
    const links = generateExternalLinks("Acme & Co");

    expect(links.linkedinSearch).toBe(
      "https://www.linkedin.com/search/results/companies/?keywords=Acme%20%26%20Co&location=United%20Kingdom"
    );
    expect(links.indeedCompany).toBe("https://uk.indeed.com/cmp/Acme%20%26%20Co");
    expect(links.companiesHouse).toBe(
      "https://find-and-update.company-information.service.gov.uk/search?q=Acme%20%26%20Co"
    );
    expect(links.reed).toBe("https://www.reed.co.uk/jobs/Acme%20%26%20Co-jobs");
  });

  it("should fall back to the whole UK without a location", () => {
    const links = generateExternalLinks("Acme", null, null);

    expect(links.locationUsed).toBe("United Kingdom");
    expect(links.indeedJobs).toBe("https://uk.indeed.com/jobs?q=Acme&l=United+Kingdom");
    expect(links.google).toBe("https://www.google.com/search?q=Acme");
    expect(links.googleMaps).toBe("https://www.google.com/maps/search/Acme");
  });

  it("should skip a blank county", () => {
    const links = generateExternalLinks("Acme", "London", "  ");

    expect(links.locationUsed).toBe("London");
    expect(links.indeedJobs).toBe("https://uk.indeed.com/jobs?q=Acme&l=London");
  });
});
