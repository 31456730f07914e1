import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { articleId, createArticle } from "../../extract";
import { FileCorpusStore, INDEX_FILE_NAME } from "../fileCorpusStore";

let storageDir: string;

beforeEach(() => {
  storageDir = fs.mkdtempSync(path.join(os.tmpdir(), "kb-store-"));
});

afterEach(() => {
  fs.rmSync(storageDir, { recursive: true, force: true });
});

function sampleArticle(title: string, body: string, tags: string[] = []) {
  return createArticle({
    title,
    address: `https://kb.test/content/${encodeURIComponent(title)}`,
    body,
    tags,
    category: "Payments",
    retrievedAt: "2024-06-01T08:00:00.000Z",
  });
}

describe("FileCorpusStore", () => {
  it("writes one entry file and one index record", async () => {
    const store = new FileCorpusStore(storageDir);
    const article = sampleArticle("Debt repayment", "Pay the debt in three parts.");

    const saved = await store.save(article);

    expect(saved.id).toBe(articleId(article));
    expect(saved.indexed).toBe(true);
    expect(saved.path).toBe(path.join(storageDir, `${saved.id}.json`));
    expect(await store.listIndex()).toEqual([
      {
        id: saved.id,
        title: "Debt repayment",
        address: article.address,
        category: "Payments",
        wordCount: 6,
        retrievedAt: "2024-06-01T08:00:00.000Z",
      },
    ]);

    const entry = await store.get(saved.id);
    expect(entry?.body).toBe("Pay the debt in three parts.");
    expect(entry?.tags).toEqual([]);
  });

  it("replaces the entry when the same content is saved twice", async () => {
    const store = new FileCorpusStore(storageDir);
    const article = sampleArticle("Debt repayment", "Pay the debt in three parts.");

    const first = await store.save(article);
    const second = await store.save(article);

    expect(second.id).toBe(first.id);
    expect(await store.listIndex()).toHaveLength(1);
    expect(fs.readdirSync(storageDir).sort()).toEqual([`${first.id}.json`, INDEX_FILE_NAME].sort());
  });

  it("keeps both versions when the body changes", async () => {
    const store = new FileCorpusStore(storageDir);

    await store.save(sampleArticle("Debt repayment", "Old wording."));
    await store.save(sampleArticle("Debt repayment", "New wording after the update."));

    expect(await store.stats()).toMatchObject({ totalArticles: 2, totalWords: 2 + 5 });
  });

  it("keeps every record when saves run concurrently", async () => {
    const store = new FileCorpusStore(storageDir);
    const articles = ["One body", "Two body", "Three body", "Four body"].map((body) => sampleArticle("Parallel", body));

    await Promise.all(articles.map((article) => store.save(article)));

    expect((await store.listIndex()).map((record) => record.id).sort()).toEqual(
      articles.map((article) => articleId(article)).sort(),
    );
  });

  it("reports zero totals when nothing has been saved", async () => {
    const stats = await new FileCorpusStore(storageDir).stats();

    expect(stats.totalArticles).toBe(0);
    expect(stats.totalWords).toBe(0);
  });

  it("searches titles, bodies and tags without regard to case", async () => {
    const store = new FileCorpusStore(storageDir);
    await store.save(sampleArticle("Benefits overview", "Who can apply.", ["Льгота"]));
    await store.save(sampleArticle("Meter check", "Verification every six years."));

    expect((await store.search("льгота")).map((hit) => hit.title)).toEqual(["Benefits overview"]);
    expect((await store.search("VERIFICATION")).map((hit) => hit.title)).toEqual(["Meter check"]);
  });

  it("returns every entry for a blank query", async () => {
    const store = new FileCorpusStore(storageDir);
    const first = await store.save(sampleArticle("Benefits overview", "Who can apply."));
    const second = await store.save(sampleArticle("Meter check", "Verification every six years."));

    expect((await store.search("   ")).map((hit) => hit.id)).toEqual([first.id, second.id].sort());
  });

  it("builds excerpts from the first 200 characters", async () => {
    const store = new FileCorpusStore(storageDir);
    const body = "x".repeat(250);
    await store.save(sampleArticle("Long article", body));

    const [hit] = await store.search("long");

    expect(hit.excerpt).toBe(`${"x".repeat(200)}…`);
  });

  it("rebuilds a lost index from the entry files", async () => {
    const store = new FileCorpusStore(storageDir);
    await store.save(sampleArticle("First article", "alpha"));
    await store.save(sampleArticle("Second article", "beta gamma"));
    fs.rmSync(path.join(storageDir, INDEX_FILE_NAME));

    expect(await store.stats()).toMatchObject({ totalArticles: 0 });
    await expect(store.rebuildIndex()).resolves.toBe(2);
    expect(await store.stats()).toMatchObject({ totalArticles: 2, totalWords: 3 });
  });

  it("keeps the entry and warns when the index cannot be updated", async () => {
    const store = new FileCorpusStore(storageDir);
    fs.mkdirSync(path.join(storageDir, INDEX_FILE_NAME));

    const saved = await store.save(sampleArticle("Orphan entry", "Saved anyway."));

    expect(saved.indexed).toBe(false);
    expect(saved.warning).toContain(`Entry ${saved.id} saved but index update failed`);
    expect(fs.existsSync(saved.path)).toBe(true);
  });
});
