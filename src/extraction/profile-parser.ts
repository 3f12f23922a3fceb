import * as cheerio from "cheerio";
import type { ProfileRecord } from "../types.js";
import type { Logger } from "../utils/logger.js";
import { candidateFromJsonLd, findProfileNodes } from "./json-ld.js";
import { candidateFromMicrodata } from "./microdata.js";
import { createRecord, mergeRecords, needsFallback } from "./record.js";

export type ProfileParser = (html: string, profileUrl: string, logger?: Logger) => ProfileRecord;

/**
 * Extract one contact record from a profile page.
 *
 * JSON-LD nodes are merged first, in document order. Microdata is consulted only when
 * the name or primary phone is still missing, and only fills empty fields.
 */
export const parseProfilePage: ProfileParser = (html, profileUrl, logger) => {
  const $ = cheerio.load(html);
  const record = createRecord(profileUrl);

  for (const node of findProfileNodes($, logger, profileUrl)) {
    mergeRecords(record, candidateFromJsonLd(node));
  }

  if (needsFallback(record)) {
    mergeRecords(record, candidateFromMicrodata($));
  }

  return record;
};
