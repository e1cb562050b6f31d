import type { ProfileData, ProfileSource } from "./profile-source.interface.js";

/**
 * Builds search links from the company name alone.
 * Always available, never calls out; the fallback for every other source.
 */
export class AlgorithmicProfileSource implements ProfileSource {
  getName(): string {
    return "algorithmic";
  }

  isAvailable(): boolean {
    return true;
  }

  async lookup(companyName: string): Promise<ProfileData> {
    return this.buildProfile(companyName);
  }

  buildProfile(companyName: string): ProfileData {
    const query = encodeURIComponent(companyName);
    return {
      companyName,
      linkedinUrl: `https://www.linkedin.com/search/results/companies/?keywords=${query}`,
      linkedinTitle: null,
      indeedUrl: `https://www.indeed.com/jobs?q=&l=United+Kingdom&rbc=${query}`,
      glassdoorUrl: `https://www.glassdoor.com/Search/results.htm?keyword=${query}`,
      glassdoorRating: null,
      websiteUrl: `https://www.google.com/search?q=${query}`
    };
  }
}
