import type { DelayRange } from "./utils/rate-limiter.js";

/**
 * One advisor's contact sheet, reconciled from every signal found on a profile page.
 * Text fields are trimmed; a field with nothing in it is null, never "".
 */
export interface ProfileRecord {
  name: string | null;
  phone: string | null;
  phone2: string | null;
  zip: string | null;
  city: string | null;
  street: string | null;
  email: string | null;
  /** Set when the record is created and never overwritten */
  readonly profileUrl: string;
}

/**
 * Page-scoped signal (a JSON-LD node or a microdata bundle) mapped into the record shape
 */
export type ProfileCandidate = Omit<ProfileRecord, "profileUrl">;

/**
 * Record fields in presentation order, with their column labels
 */
export const RECORD_COLUMNS: ReadonlyArray<{ key: keyof ProfileRecord; label: string }> = [
  { key: "name", label: "Name" },
  { key: "phone", label: "Phone" },
  { key: "phone2", label: "Phone 2" },
  { key: "zip", label: "ZIP" },
  { key: "city", label: "City" },
  { key: "street", label: "Street" },
  { key: "email", label: "Email" },
  { key: "profileUrl", label: "Profile URL" },
];

/**
 * Options for one harvesting run
 */
export interface HarvestOptions {
  /** Seed sitemap URLs, expanded in order */
  sitemaps: string[];
  /** Where the exporter writes the records */
  output: string;
  /** Cap on the number of profile URLs fetched (after sorting). Default: no cap */
  limit?: number;
  /** Number of fetch workers. Default: 8 */
  concurrency: number;
  /** Per-request pause drawn from this range. Default: 300-800ms */
  delay: DelayRange;
  /** Path fragment identifying profile pages. Default: "/vermoegensberater/" */
  profileMarker: string;
  /** Timeout for a profile page request. Default: 60000 */
  pageTimeoutMs: number;
  /** Timeout for a sitemap request. Default: 90000 */
  sitemapTimeoutMs: number;
  /** Log a progress line every N processed URLs. Default: 100 */
  progressInterval: number;
}

export const DEFAULT_PROFILE_MARKER = "/vermoegensberater/";

export const DEFAULT_OPTIONS: HarvestOptions = {
  sitemaps: ["https://www.dvag.de/sitemap-index.xml"],
  output: "vermoegensberater.csv",
  concurrency: 8,
  delay: { minMs: 300, maxMs: 800 },
  profileMarker: DEFAULT_PROFILE_MARKER,
  pageTimeoutMs: 60_000,
  sitemapTimeoutMs: 90_000,
  progressInterval: 100,
};

/**
 * A URL that produced no record, and why
 */
export interface FetchFailure {
  url: string;
  reason: string;
  statusCode?: number;
}

export interface HarvestProgress {
  completed: number;
  total: number;
  currentUrl: string;
}

export type HarvestStatus = "exported" | "no-profiles" | "no-records";

export interface HarvestSummary {
  status: HarvestStatus;
  /** Profile URLs handed to the fetch pipeline (after the limit) */
  profileUrls: number;
  records: number;
  /** Records with neither a name, a phone nor an email */
  emptyRecords: number;
  failures: FetchFailure[];
  outputPath?: string;
  durationMs: number;
}
