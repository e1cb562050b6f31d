/**
 * UK-focused profile and job board links for a sponsor.
 */
export interface ExternalLinks {
  linkedinSearch: string;
  linkedinJobs: string;
  indeedJobs: string;
  indeedCompany: string;
  glassdoorOverview: string;
  glassdoorJobs: string;
  companiesHouse: string;
  google: string;
  googleMaps: string;
  reed: string;
  totaljobs: string;
  cwjobs: string;
  /** "City, County" when known, otherwise "United Kingdom" */
  locationUsed: string;
}

const UK_LOCATION_PARAM = "United+Kingdom";

/**
 * Build search links for a company, narrowed by its location when known.
 *
 * @param companyName - Registered company name
 * @param city - Town or city from the register
 * @param county - County from the register
 */
export function generateExternalLinks(
  companyName: string,
  city?: string | null,
  county?: string | null
): ExternalLinks {
  const locationParts = [city, county]
    .map((part) => part?.trim() ?? "")
    .filter((part) => part.length > 0);
  const locationStr = locationParts.join(", ");

  const companyQuery = encodeURIComponent(companyName);
  const companyLocationQuery = locationStr
    ? encodeURIComponent(`${companyName} ${locationStr} UK`)
    : companyQuery;
  const locationQuery = locationStr
    ? encodeURIComponent(locationStr)
    : UK_LOCATION_PARAM;
  const mapsQuery = locationStr
    ? encodeURIComponent(`${companyName} ${locationStr}`)
    : companyQuery;

  return {
    linkedinSearch: `https://www.linkedin.com/search/results/companies/?keywords=${companyQuery}&location=United%20Kingdom`,
    linkedinJobs: `https://www.linkedin.com/jobs/search?keywords=${companyQuery}&location=United%20Kingdom`,
    indeedJobs: `https://uk.indeed.com/jobs?q=${companyQuery}&l=${locationQuery}`,
    indeedCompany: `https://uk.indeed.com/cmp/${companyQuery}`,
    glassdoorOverview: `https://www.glassdoor.co.uk/Overview/Working-at-${companyQuery}-EI_IE.htm`,
    glassdoorJobs: `https://www.glassdoor.co.uk/Search/results.htm?keyword=${companyQuery}`,
    companiesHouse: `https://find-and-update.company-information.service.gov.uk/search?q=${companyQuery}`,
    google: `https://www.google.com/search?q=${companyLocationQuery}`,
    googleMaps: `https://www.google.com/maps/search/${mapsQuery}`,
    reed: `https://www.reed.co.uk/jobs/${companyQuery}-jobs`,
    totaljobs: `https://www.totaljobs.com/jobs/${companyQuery}`,
    cwjobs: `https://www.cwjobs.co.uk/jobs/${companyQuery}`,
    locationUsed: locationStr || "United Kingdom"
  };
}
