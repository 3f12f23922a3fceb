import fs from "node:fs";
import path from "node:path";
import { RECORD_COLUMNS, type ProfileRecord } from "../types.js";

/**
 * Writes the final record collection somewhere. Column identity and order come from RECORD_COLUMNS.
 */
export interface RecordExporter {
  export(records: readonly ProfileRecord[], outputPath: string): Promise<void>;
}

export function serializeCsvField(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return "";
  // RFC 4180: quote every field and double inner quotes
  const escaped = String(value).replace(/"/g, '""');
  return `"${escaped}"`;
}

export function toCsvLine(values: ReadonlyArray<string | null>): string {
  return values.map((v) => serializeCsvField(v)).join(",");
}

export function recordToRow(record: ProfileRecord): Array<string | null> {
  return RECORD_COLUMNS.map(({ key }) => record[key]);
}

/**
 * Render records as CSV text, header first, rows sorted by profile URL.
 */
export function renderCsv(records: readonly ProfileRecord[]): string {
  const sorted = [...records].sort((a, b) =>
    a.profileUrl < b.profileUrl ? -1 : a.profileUrl > b.profileUrl ? 1 : 0
  );
  const lines = [
    toCsvLine(RECORD_COLUMNS.map((c) => c.label)),
    ...sorted.map((r) => toCsvLine(recordToRow(r))),
  ];
  return lines.join("\n") + "\n";
}

export class CsvRecordExporter implements RecordExporter {
  async export(records: readonly ProfileRecord[], outputPath: string): Promise<void> {
    const filePath = path.resolve(outputPath);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, renderCsv(records), "utf8");
  }
}
