import type { ProfileCandidate, ProfileRecord } from "../types.js";

/**
 * Trim a value and map empty results to null.
 * Numbers are accepted as their decimal string (postal codes are often numeric in JSON-LD).
 */
export function cleanText(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value !== "string") return null;
  const cleaned = value.trim();
  return cleaned ? cleaned : null;
}

export function emptyCandidate(): ProfileCandidate {
  return {
    name: null,
    phone: null,
    phone2: null,
    zip: null,
    city: null,
    street: null,
    email: null,
  };
}

export function createRecord(profileUrl: string): ProfileRecord {
  return { ...emptyCandidate(), profileUrl };
}

/**
 * Fill the primary and secondary phone slots, in discovery order.
 * Duplicates and anything past the second number are dropped.
 */
export function assignPhones(target: ProfileCandidate, phones: readonly string[]): void {
  const unique = dedupe(phones);
  target.phone = unique[0] ?? null;
  target.phone2 = unique[1] ?? null;
}

export function dedupe(values: readonly string[]): string[] {
  const out: string[] = [];
  for (const value of values) {
    if (!out.includes(value)) out.push(value);
  }
  return out;
}

function pick(existing: string | null, incoming: string | null): string | null {
  if (existing) return existing;
  return cleanText(incoming) ?? existing;
}

/**
 * Merge a candidate into a record, first writer wins per field.
 * A field is only filled when it is still empty and the candidate value is non-empty after trimming.
 * Mutates and returns `base`; `profileUrl` is never touched.
 */
export function mergeRecords<T extends ProfileCandidate>(base: T, candidate: ProfileCandidate): T {
  base.name = pick(base.name, candidate.name);
  base.phone = pick(base.phone, candidate.phone);
  base.phone2 = pick(base.phone2, candidate.phone2);
  base.zip = pick(base.zip, candidate.zip);
  base.city = pick(base.city, candidate.city);
  base.street = pick(base.street, candidate.street);
  base.email = pick(base.email, candidate.email);
  return base;
}

export function hasContactSignal(record: ProfileCandidate): boolean {
  return Boolean(record.name || record.phone || record.email);
}

/**
 * Needs the microdata fallback when JSON-LD left the name or primary phone empty
 */
export function needsFallback(record: ProfileCandidate): boolean {
  return !record.name || !record.phone;
}
