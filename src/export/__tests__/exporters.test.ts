import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import ExcelJS from "exceljs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ExportError } from "../../core/errors";
import { createArticle } from "../../extract";
import { FileCorpusStore } from "../../store";
import { CorpusEntry } from "../../types";
import { CSV_FILE_NAME, escapeCsvField, exportCsv } from "../csvExporter";
import { ARTICLES_SHEET, STATISTICS_SHEET, buildWorkbook, exportSpreadsheet } from "../spreadsheetExporter";

const RETRIEVED_AT = "2024-06-01T08:00:00.000Z";

let workDir: string;

beforeEach(() => {
  workDir = fs.mkdtempSync(path.join(os.tmpdir(), "kb-export-"));
});

afterEach(() => {
  fs.rmSync(workDir, { recursive: true, force: true });
});

const nightRate = createArticle({
  title: 'Tariff, "night" rate',
  address: "https://kb.test/content/night",
  body: "Night rate applies after eleven.",
  category: "Tariffs",
  retrievedAt: RETRIEVED_AT,
});

const benefits = createArticle({
  title: "Льготы",
  address: "https://kb.test/content/benefits",
  body: "Список льгот.",
  tags: ["льгота", "скидка"],
  retrievedAt: RETRIEVED_AT,
});

async function populatedStore(): Promise<{ store: FileCorpusStore; ids: string[] }> {
  const store = new FileCorpusStore(path.join(workDir, "corpus"));
  const ids = [(await store.save(nightRate)).id, (await store.save(benefits)).id];
  return { store, ids };
}

function entry(id: string, body: string): CorpusEntry {
  return { ...benefits, id, body, persistedAt: "2024-06-02T00:00:00.000Z" };
}

describe("escapeCsvField", () => {
  it("quotes fields with separators, quotes or line breaks", () => {
    expect(escapeCsvField("plain")).toBe("plain");
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("two\nlines")).toBe('"two\nlines"');
  });
});

describe("exportCsv", () => {
  it("writes one row per index record with a byte-order mark", async () => {
    const { store, ids } = await populatedStore();
    const outputDir = path.join(workDir, "exports");

    const target = await exportCsv(store, outputDir);

    expect(target).toBe(path.resolve(outputDir, CSV_FILE_NAME));
    expect(fs.readFileSync(target, "utf-8")).toBe(
      "\uFEFFid,title,address,category,word_count,retrieved_at\r\n" +
        `${ids[0]},"Tariff, ""night"" rate",https://kb.test/content/night,Tariffs,5,${RETRIEVED_AT}\r\n` +
        `${ids[1]},Льготы,https://kb.test/content/benefits,,2,${RETRIEVED_AT}\r\n`,
    );
  });

  it("refuses to export an empty corpus", async () => {
    const store = new FileCorpusStore(path.join(workDir, "empty"));

    await expect(exportCsv(store, path.join(workDir, "exports"))).rejects.toBeInstanceOf(ExportError);
    expect(fs.existsSync(path.join(workDir, "exports", CSV_FILE_NAME))).toBe(false);
  });
});

describe("buildWorkbook", () => {
  it("lists entries and corpus totals on separate sheets", () => {
    const exportedAt = new Date("2024-07-01T00:00:00.000Z");
    const workbook = buildWorkbook([entry("a_1", "one two"), entry("b_2", "three")], exportedAt);

    const articles = workbook.getWorksheet(ARTICLES_SHEET);
    expect(articles?.rowCount).toBe(3);
    expect(articles?.getCell("A2").value).toBe("a_1");
    expect(articles?.getCell("E2").value).toBe("льгота; скидка");

    const statistics = workbook.getWorksheet(STATISTICS_SHEET);
    expect(statistics?.getCell("A2").value).toBe("Total articles");
    expect(statistics?.getCell("B2").value).toBe(2);
    expect(statistics?.getCell("B3").value).toBe(benefits.wordCount * 2);
    expect(statistics?.getCell("B4").value).toBe("2024-07-01T00:00:00.000Z");
  });

  it("truncates bodies to the cell size limit", () => {
    const workbook = buildWorkbook([entry("long_1", "y".repeat(40_000))], new Date());

    expect(String(workbook.getWorksheet(ARTICLES_SHEET)?.getCell("K2").value)).toHaveLength(32_767);
  });
});

describe("exportSpreadsheet", () => {
  it("writes a workbook that reads back", async () => {
    const { store } = await populatedStore();
    const outputDir = path.join(workDir, "exports");

    const target = await exportSpreadsheet(store, outputDir, new Date("2024-07-01T00:00:00.000Z"));

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(target);
    expect(workbook.getWorksheet(ARTICLES_SHEET)?.rowCount).toBe(3);
    expect(workbook.getWorksheet(STATISTICS_SHEET)?.getCell("B2").value).toBe(2);
    expect(workbook.getWorksheet(STATISTICS_SHEET)?.getCell("B3").value).toBe(7);
  });

  it("refuses to export an empty corpus", async () => {
    const store = new FileCorpusStore(path.join(workDir, "empty"));

    await expect(exportSpreadsheet(store, path.join(workDir, "exports"))).rejects.toBeInstanceOf(ExportError);
  });
});
