export const DEFAULT_SITES = [
  // Tech & funding news
  "techcrunch.com",
  "crunchbase.com",
  "pitchbook.com",
  "cbinsights.com",
  "venturebeat.com",
  "theinformation.com",
  "axios.com",
  "businessinsider.com",
  "forbes.com",
  "reuters.com",
  "bloomberg.com",
  "ft.com",
  // Robotics / restaurant trades
  "therobotreport.com",
  "robotics247.com",
  "roboticsbusinessreview.com",
  "thespoon.tech",
  "qsrmagazine.com",
  "nrn.com",
  "restaurantdive.com",
  "fastcasual.com",
  "modernrestaurantmanagement.com",
  // Newswires
  "prnewswire.com",
  "globenewswire.com",
  "businesswire.com",
  "newswire.com",
  // Hospitality trades
  "asianhospitality.com",
  "hotelmanagement.net",
  "hospitalitynet.org",
];

// OR-group appended to every search query.
export const FUNDING_KEYWORDS = [
  "funding",
  "raises",
  "raised",
  "raise",
  "series A",
  "series B",
  "series C",
  "series D",
  "seed round",
  "pre-seed",
  "angel round",
  "venture funding",
  "equity financing",
  "convertible note",
  "round led by",
  "led by",
  "investment",
  "invests",
  "backs",
];

// Title/snippet hits that count as a funding signal on their own.
export const FUNDING_HARD_KEYWORDS = [
  "raises",
  "raised",
  "raise",
  "funding",
  "series a",
  "series b",
  "series c",
  "series d",
  "seed round",
  "pre-seed",
  "angel round",
  "investment round",
  "round led by",
  "led by",
  "backs",
  "invests in",
  "equity financing",
  "venture funding",
];

export const EXCLUDED_DOMAINS = new Set([
  "facebook.com",
  "x.com",
  "twitter.com",
  "linkedin.com",
  "youtube.com",
  "medium.com",
]);

export const JOB_DOMAINS = new Set([
  "talents.vaia.com",
  "boards.greenhouse.io",
  "jobs.lever.co",
  "lever.co",
  "careers.google.com",
  "jobs.workable.com",
  "workable.com",
  "smartrecruiters.com",
  "indeed.com",
  "linkedin.com",
  "glassdoor.com",
  "angel.co",
  "wellfound.com",
  "monster.com",
  "ziprecruiter.com",
  "jobvite.com",
]);

export const JOB_KEYWORDS = [
  "job",
  "career",
  "hiring",
  "apply",
  "recruit",
  "talent",
  "vacancy",
  "position",
  "opening",
  "role",
];

// Negated at the query level to keep job boards out of the result pages.
export const QUERY_EXCLUDE_WORDS = [
  "job",
  "jobs",
  "career",
  "careers",
  "apply",
  "hiring",
  "recruit",
  "talent",
];

export const MIN_PUBLISH_YEAR = 2018;
export const MIN_AMOUNT_FOR_SIGNAL = 100_000;
export const MIN_PLAUSIBLE_AMOUNT = 10_000;
export const MAX_PLAUSIBLE_AMOUNT = 10_000_000_000;

export const SEARCH_PAGE_SIZE = 10;
export const SEARCH_MAX_OFFSET = 100;
