import type { CheerioAPI } from "cheerio";
import { MalformedDocumentError, describeError } from "../errors.js";
import type { ProfileCandidate } from "../types.js";
import type { Logger } from "../utils/logger.js";
import { assignPhones, cleanText, emptyCandidate } from "./record.js";

/**
 * JSON-LD entity types that describe an advisor or their office
 */
export const PROFILE_SCHEMA_TYPES: ReadonlySet<string> = new Set([
  "person",
  "financialservice",
  "localbusiness",
  "professionalservice",
]);

export type JsonLdNode = Record<string, unknown>;

export type JsonLdParseResult =
  | { ok: true; nodes: JsonLdNode[] }
  | { ok: false; error: MalformedDocumentError };

function isNode(value: unknown): value is JsonLdNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toList(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

export function hasProfileType(node: JsonLdNode): boolean {
  return toList(node["@type"]).some((t) => PROFILE_SCHEMA_TYPES.has(String(t).toLowerCase()));
}

/**
 * Parse a JSON-LD payload and flatten it into candidate nodes.
 * Accepts a single object, an array of objects, or an object carrying an `@graph` array.
 *
 * Invalid JSON comes back as a failed result rather than a throw.
 */
export function parseJsonLdPayload(raw: string, url?: string): JsonLdParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error: unknown) {
    return {
      ok: false,
      error: new MalformedDocumentError("json", describeError(error), {
        url,
        cause: error instanceof Error ? error : undefined,
      }),
    };
  }

  const nodes: JsonLdNode[] = [];
  for (const item of toList(parsed)) {
    if (!isNode(item)) continue;
    nodes.push(item);
    for (const graphItem of toList(item["@graph"])) {
      if (isNode(graphItem)) nodes.push(graphItem);
    }
  }
  return { ok: true, nodes };
}

/**
 * Every JSON-LD node on the page whose `@type` marks a profile, in document order.
 * Blocks that fail to parse are skipped, with a debug line when a logger is given.
 */
export function findProfileNodes($: CheerioAPI, logger?: Logger, pageUrl?: string): JsonLdNode[] {
  const found: JsonLdNode[] = [];
  $('script[type="application/ld+json"]').each((_i, el) => {
    const raw = $(el).text().trim();
    if (!raw) return;
    const parsed = parseJsonLdPayload(raw, pageUrl);
    if (!parsed.ok) {
      logger?.debug(
        `Skipping JSON-LD block${pageUrl ? ` on ${pageUrl}` : ""}: ${parsed.error.message}`
      );
      return;
    }
    for (const node of parsed.nodes) {
      if (hasProfileType(node)) found.push(node);
    }
  });
  return found;
}

/**
 * Map one JSON-LD node to a candidate.
 *
 * Phones come from the top-level `telephone` first, then from each `contactPoint`.
 * Email prefers a contact point over the top-level `email`.
 */
export function candidateFromJsonLd(node: JsonLdNode): ProfileCandidate {
  const candidate = emptyCandidate();
  candidate.name = cleanText(node.name);

  const phones: string[] = [];
  for (const value of toList(node.telephone)) {
    const phone = cleanText(value);
    if (phone) phones.push(phone);
  }

  for (const contact of toList(node.contactPoint)) {
    if (!isNode(contact)) continue;
    const phone = cleanText(contact.telephone);
    if (phone) phones.push(phone);
    if (!candidate.email) {
      candidate.email = cleanText(contact.email);
    }
  }

  assignPhones(candidate, phones);

  const address = node.address;
  if (isNode(address)) {
    candidate.street = cleanText(address.streetAddress);
    candidate.zip = cleanText(address.postalCode);
    candidate.city = cleanText(address.addressLocality);
  }

  if (!candidate.email) {
    candidate.email = cleanText(node.email);
  }

  return candidate;
}
