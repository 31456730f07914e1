import fs from "node:fs";
import path from "node:path";
import { ExportError, errorMessage } from "../core/errors";
import { CorpusStore } from "../store";
import { IndexRecord } from "../types";

export const CSV_FILE_NAME = "articles_export.csv";
const CSV_COLUMNS: ReadonlyArray<{ header: string; value: (record: IndexRecord) => string }> = [
  { header: "id", value: (record) => record.id },
  { header: "title", value: (record) => record.title },
  { header: "address", value: (record) => record.address },
  { header: "category", value: (record) => record.category },
  { header: "word_count", value: (record) => String(record.wordCount) },
  { header: "retrieved_at", value: (record) => record.retrievedAt },
];

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** RFC 4180 rows (CRLF line ends), UTF-8 with a byte-order mark so spreadsheet tools detect the encoding of Cyrillic text. */
export function renderCsv(records: readonly IndexRecord[]): string {
  const lines = [CSV_COLUMNS.map((column) => column.header).join(",")];
  for (const record of records) {
    lines.push(CSV_COLUMNS.map((column) => escapeCsvField(column.value(record))).join(","));
  }
  return `\uFEFF${lines.join("\r\n")}\r\n`;
}

export async function exportCsv(store: CorpusStore, outputDir: string): Promise<string> {
  let records: IndexRecord[];
  try {
    records = await store.listIndex();
  } catch (error) {
    throw new ExportError(`Cannot read index for CSV export: ${errorMessage(error)}`, { cause: error });
  }
  if (records.length === 0) {
    throw new ExportError("No articles to export");
  }

  const target = path.resolve(outputDir, CSV_FILE_NAME);
  try {
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, renderCsv(records), "utf-8");
  } catch (error) {
    throw new ExportError(`Failed to write ${target}: ${errorMessage(error)}`, { cause: error });
  }
  return target;
}
