import fs from "node:fs";
import path from "node:path";
import ExcelJS from "exceljs";
import { ExportError, errorMessage } from "../core/errors";
import { CorpusStore } from "../store";
import { CorpusEntry } from "../types";

export const SPREADSHEET_FILE_NAME = "articles_export.xlsx";
export const ARTICLES_SHEET = "Articles";
export const STATISTICS_SHEET = "Statistics";

// Hard per-cell limit of the xlsx format.
const MAX_CELL_LENGTH = 32_767;

export function buildWorkbook(entries: readonly CorpusEntry[], exportedAt: Date): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = exportedAt;

  const articles = workbook.addWorksheet(ARTICLES_SHEET);
  articles.columns = [
    { header: "ID", key: "id", width: 32 },
    { header: "Title", key: "title", width: 48 },
    { header: "Address", key: "address", width: 48 },
    { header: "Category", key: "category", width: 20 },
    { header: "Tags", key: "tags", width: 24 },
    { header: "Date", key: "date", width: 16 },
    { header: "Author", key: "author", width: 20 },
    { header: "Word count", key: "wordCount", width: 12 },
    { header: "Retrieved at", key: "retrievedAt", width: 24 },
    { header: "Persisted at", key: "persistedAt", width: 24 },
    { header: "Body", key: "body", width: 80 },
  ];
  for (const entry of entries) {
    articles.addRow({
      id: entry.id,
      title: entry.title,
      address: entry.address,
      category: entry.category ?? "",
      tags: entry.tags.join("; "),
      date: entry.metadata.date ?? "",
      author: entry.metadata.author ?? "",
      wordCount: entry.wordCount,
      retrievedAt: entry.retrievedAt,
      persistedAt: entry.persistedAt,
      body: entry.body.slice(0, MAX_CELL_LENGTH),
    });
  }
  articles.getRow(1).font = { bold: true };

  const statistics = workbook.addWorksheet(STATISTICS_SHEET);
  statistics.columns = [
    { header: "Metric", key: "metric", width: 24 },
    { header: "Value", key: "value", width: 28 },
  ];
  statistics.addRow({ metric: "Total articles", value: entries.length });
  statistics.addRow({ metric: "Total words", value: entries.reduce((total, entry) => total + entry.wordCount, 0) });
  statistics.addRow({ metric: "Exported at", value: exportedAt.toISOString() });
  statistics.getRow(1).font = { bold: true };

  return workbook;
}

export async function exportSpreadsheet(store: CorpusStore, outputDir: string, now = new Date()): Promise<string> {
  let entries: CorpusEntry[];
  try {
    entries = await store.listEntries();
  } catch (error) {
    throw new ExportError(`Cannot read entries for spreadsheet export: ${errorMessage(error)}`, { cause: error });
  }
  if (entries.length === 0) {
    throw new ExportError("No articles to export");
  }

  const target = path.resolve(outputDir, SPREADSHEET_FILE_NAME);
  try {
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await buildWorkbook(entries, now).xlsx.writeFile(target);
  } catch (error) {
    throw new ExportError(`Failed to write ${target}: ${errorMessage(error)}`, { cause: error });
  }
  return target;
}
