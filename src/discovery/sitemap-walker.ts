import { gunzipSync } from "node:zlib";
import { DOMParser } from "@xmldom/xmldom";
import { HttpStatusError, MalformedDocumentError, describeError } from "../errors.js";
import type { HttpSession } from "../http/session.js";
import { decodeBody } from "../http/session.js";
import { DEFAULT_PROFILE_MARKER, type FetchFailure } from "../types.js";
import type { Logger } from "../utils/logger.js";

export const SITEMAP_NAMESPACE = "http://www.sitemaps.org/schemas/sitemap/0.9";

export type LocationKind = "sitemap" | "profile" | "ignored";

export type LocationParseResult =
  | { ok: true; locations: string[] }
  | { ok: false; error: MalformedDocumentError };

export interface SitemapWalkOptions {
  session: HttpSession;
  logger?: Logger;
  /** Path fragment identifying profile pages. Default: "/vermoegensberater/" */
  profileMarker?: string;
  /** Per-sitemap request timeout. Default: 90000 */
  timeoutMs?: number;
}

export interface SitemapWalkResult {
  /** Deduplicated and lexicographically sorted */
  profileUrls: string[];
  /** Sitemaps fetched, in visiting order */
  visitedSitemaps: string[];
  failures: FetchFailure[];
}

/**
 * Extract every `<loc>` value from a sitemap or sitemap index.
 * Locations in the sitemap namespace win; documents without any fall back to un-namespaced `<loc>`.
 */
export function parseLocations(xml: string, url?: string): LocationParseResult {
  const fail = (reason: string): MalformedDocumentError =>
    new MalformedDocumentError("xml", reason, { url });

  let doc: Document;
  try {
    doc = new DOMParser({
      errorHandler: {
        warning: (msg: string) => {
          throw fail(String(msg));
        },
        error: (msg: string) => {
          throw fail(String(msg));
        },
        fatalError: (msg: string) => {
          throw fail(String(msg));
        },
      },
    }).parseFromString(xml, "text/xml");
  } catch (error: unknown) {
    if (error instanceof MalformedDocumentError) return { ok: false, error };
    return { ok: false, error: fail(describeError(error)) };
  }

  const root = doc.documentElement;
  if (!root) {
    return { ok: false, error: fail("no root element") };
  }

  const namespaced: string[] = [];
  const plain: string[] = [];
  const elements = root.getElementsByTagNameNS("*", "loc");
  for (let i = 0; i < elements.length; i++) {
    const el = elements[i];
    const text = el.textContent?.trim();
    if (!text) continue;
    if (el.namespaceURI === SITEMAP_NAMESPACE) namespaced.push(text);
    else if (!el.namespaceURI) plain.push(text);
  }

  return { ok: true, locations: namespaced.length > 0 ? namespaced : plain };
}

function locationPath(loc: string): string {
  try {
    return new URL(loc).pathname.toLowerCase();
  } catch {
    return loc.toLowerCase();
  }
}

/**
 * Decide what a `<loc>` points at.
 * Nested sitemaps are recognised by an `.xml` or `.xml.gz` path; profiles by the marker anywhere in the URL.
 */
export function classifyLocation(loc: string, profileMarker: string): LocationKind {
  const path = locationPath(loc);
  if (path.endsWith(".xml") || path.endsWith(".xml.gz")) return "sitemap";
  if (loc.toLowerCase().includes(profileMarker.toLowerCase())) return "profile";
  return "ignored";
}

/**
 * Undo file-level gzip (`.gz` sitemaps). Bodies that are not gzip data are returned unchanged.
 */
export function maybeGunzip(url: string, contentType: string | undefined, bytes: Buffer): Buffer {
  const looksGz =
    url.toLowerCase().endsWith(".gz") || (contentType ?? "").toLowerCase().includes("gzip");
  if (!looksGz) return bytes;
  try {
    return gunzipSync(bytes);
  } catch {
    return bytes;
  }
}

/**
 * Expand seed sitemaps into the profile URLs they reference, following nested sitemaps.
 *
 * Each sitemap URL is fetched at most once per call, which also breaks reference cycles.
 * A sitemap that fails to download or parse is logged and contributes nothing; the walk goes on.
 */
export async function collectProfileUrls(
  seeds: readonly string[],
  options: SitemapWalkOptions
): Promise<SitemapWalkResult> {
  const { session, logger } = options;
  const profileMarker = options.profileMarker ?? DEFAULT_PROFILE_MARKER;
  const timeoutMs = options.timeoutMs ?? 90_000;

  const visited = new Set<string>();
  const visitedSitemaps: string[] = [];
  const profiles = new Set<string>();
  const failures: FetchFailure[] = [];

  async function loadLocations(url: string): Promise<string[]> {
    logger?.debug(`Downloading sitemap: ${url}`);
    const outcome = await session.get(url, { timeoutMs });
    if (!outcome.ok) {
      const statusCode =
        outcome.error instanceof HttpStatusError ? outcome.error.statusCode : undefined;
      failures.push({ url, reason: outcome.error.message, statusCode });
      logger?.warn(`Failed to process sitemap ${url}: ${outcome.error.message}`);
      return [];
    }

    const contentType = outcome.headers["content-type"];
    const bytes = maybeGunzip(outcome.finalUrl || url, contentType, outcome.body);
    const parsed = parseLocations(decodeBody(bytes, contentType), url);
    if (!parsed.ok) {
      failures.push({ url, reason: parsed.error.message });
      logger?.warn(`Could not parse sitemap ${url}: ${parsed.error.message}`);
      return [];
    }
    return parsed.locations;
  }

  for (const seed of seeds) {
    const queue: string[] = [seed];
    for (let url = queue.shift(); url !== undefined; url = queue.shift()) {
      if (visited.has(url)) continue;
      visited.add(url);
      visitedSitemaps.push(url);

      let locations: string[];
      try {
        locations = await loadLocations(url);
      } catch (error: unknown) {
        failures.push({ url, reason: describeError(error) });
        logger?.warn(`Failed to process sitemap ${url}: ${describeError(error)}`);
        continue;
      }

      for (const loc of locations) {
        const kind = classifyLocation(loc, profileMarker);
        if (kind === "sitemap") queue.push(loc);
        else if (kind === "profile") profiles.add(loc);
      }
    }
  }

  const profileUrls = [...profiles].sort();
  logger?.info(`Total profiles detected: ${profileUrls.length}`);
  return { profileUrls, visitedSitemaps, failures };
}
