import type { CheerioAPI } from "cheerio";
import type { ProfileCandidate } from "../types.js";
import { assignPhones, cleanText, emptyCandidate } from "./record.js";

/**
 * Value of the first element carrying `itemprop="<prop>"`.
 * `<meta itemprop>` and friends hold it in `content`; everything else in its text.
 */
function firstItemProp($: CheerioAPI, prop: string): string | null {
  const el = $(`[itemprop="${prop}"]`).first();
  if (el.length === 0) return null;
  return cleanText(el.attr("content") ?? el.text());
}

function allItemProps($: CheerioAPI, prop: string): string[] {
  const values: string[] = [];
  $(`[itemprop="${prop}"]`).each((_i, node) => {
    const el = $(node);
    const value = cleanText(el.attr("content") ?? el.text());
    if (value) values.push(value);
  });
  return values;
}

/**
 * Address part of the first `mailto:` link, without any `?subject=...` query.
 */
export function extractMailto($: CheerioAPI): string | null {
  let email: string | null = null;
  $("a[href]").each((_i, node) => {
    const href = $(node).attr("href") ?? "";
    if (!href.trim().toLowerCase().startsWith("mailto:")) return;
    const address = href.trim().slice("mailto:".length).split("?")[0];
    email = cleanText(address);
    return false;
  });
  return email;
}

/**
 * Build a candidate from inline microdata attributes.
 */
export function candidateFromMicrodata($: CheerioAPI): ProfileCandidate {
  const candidate = emptyCandidate();
  candidate.name = firstItemProp($, "name");
  assignPhones(candidate, allItemProps($, "telephone"));
  candidate.email = extractMailto($);
  candidate.street = firstItemProp($, "streetAddress");
  candidate.zip = firstItemProp($, "postalCode");
  candidate.city = firstItemProp($, "addressLocality");
  return candidate;
}
