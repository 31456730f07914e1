import crypto from "node:crypto";
import { describe, expect, it } from "vitest";
import { articleId, countWords, createArticle, withBody } from "../article";
import { CONTENT_NOT_FOUND } from "../pageParser";

function md5Prefix(body: string): string {
  return crypto.createHash("md5").update(body, "utf-8").digest("hex").slice(0, 10);
}

describe("countWords", () => {
  it("counts whitespace-separated tokens", () => {
    expect(countWords("  one two\nthree\t four ")).toBe(4);
  });

  it("returns zero for empty text and counts the sentinel body", () => {
    expect(countWords("")).toBe(0);
    expect(countWords(CONTENT_NOT_FOUND)).toBe(3);
  });
});

describe("createArticle", () => {
  it("derives the word count and trims the title", () => {
    const article = createArticle({
      title: "  Meter replacement  ",
      address: "https://kb.test/content/meter",
      body: "Book a visit before the seal expires.",
    });

    expect(article.title).toBe("Meter replacement");
    expect(article.wordCount).toBe(7);
    expect(article.tags).toEqual([]);
    expect(article.category).toBeUndefined();
  });

  it("omits absent metadata keys", () => {
    const article = createArticle({
      title: "Tariff change",
      address: "https://kb.test/content/tariff",
      body: "text",
      metadata: { date: "2024-01-01", author: "" },
    });

    expect(article.metadata).toEqual({ date: "2024-01-01" });
    expect("author" in article.metadata).toBe(false);
  });

  it("returns a frozen value", () => {
    const article = createArticle({
      title: "Tariff change",
      address: "https://kb.test/content/tariff",
      body: "text",
      tags: ["тариф"],
    });

    expect(Object.isFrozen(article)).toBe(true);
    expect(Object.isFrozen(article.tags)).toBe(true);
    expect(Object.isFrozen(article.metadata)).toBe(true);
  });

  it("rejects a blank title", () => {
    expect(() => createArticle({ title: "   ", address: "https://kb.test/content/x", body: "text" })).toThrow(
      "Article title must not be empty",
    );
  });
});

describe("withBody", () => {
  it("recomputes the word count and keeps the retrieval time", () => {
    const original = createArticle({
      title: "Debt rules",
      address: "https://kb.test/content/debt",
      body: "one two",
      retrievedAt: "2024-05-01T10:00:00.000Z",
    });

    const updated = withBody(original, "one two three four");

    expect(updated.wordCount).toBe(4);
    expect(updated.retrievedAt).toBe("2024-05-01T10:00:00.000Z");
    expect(original.wordCount).toBe(2);
  });
});

describe("articleId", () => {
  it("joins the letters and digits of the title with a body digest", () => {
    expect(articleId({ title: "Оплата: счёт №5!", body: "text" })).toBe(`Оплатасчёт5_${md5Prefix("text")}`);
  });

  it("keeps at most twenty title characters", () => {
    expect(articleId({ title: "abcdefghijklmnopqrstuvwxyz", body: "b" })).toBe(`abcdefghijklmnopqrst_${md5Prefix("b")}`);
  });

  it("is stable for the same content and changes with the body", () => {
    const first = articleId({ title: "Same title", body: "first body" });
    expect(articleId({ title: "Same title", body: "first body" })).toBe(first);
    expect(articleId({ title: "Same title", body: "second body" })).not.toBe(first);
  });
});
