import crypto from "node:crypto";
import { Article, ArticleMetadata } from "../types";

export interface ArticleInput {
  title: string;
  address: string;
  body: string;
  category?: string;
  tags?: readonly string[];
  metadata?: ArticleMetadata;
  retrievedAt?: string;
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

function compactMetadata(metadata: ArticleMetadata): Readonly<ArticleMetadata> {
  const compact: ArticleMetadata = {};
  if (metadata.date) {
    compact.date = metadata.date;
  }
  if (metadata.author) {
    compact.author = metadata.author;
  }
  if (metadata.category) {
    compact.category = metadata.category;
  }
  return Object.freeze(compact);
}

/** The only way to build an `Article`; `wordCount` is derived from `body`. */
export function createArticle(input: ArticleInput): Article {
  const title = input.title.trim();
  if (!title) {
    throw new Error("Article title must not be empty");
  }

  const article: Article = {
    title,
    address: input.address,
    body: input.body,
    category: input.category || undefined,
    tags: Object.freeze([...(input.tags ?? [])]),
    metadata: compactMetadata(input.metadata ?? {}),
    wordCount: countWords(input.body),
    retrievedAt: input.retrievedAt ?? new Date().toISOString(),
  };
  return Object.freeze(article);
}

export function withBody(article: Article, body: string): Article {
  return createArticle({ ...article, body });
}

const NON_ALNUM = /[^\p{L}\p{N}]/gu;

/**
 * `<first 20 letters/digits of the title>_<first 10 hex of md5(body)>`. Stable for unchanged
 * content, and a materially different body yields a different id.
 */
export function articleId(article: Pick<Article, "title" | "body">): string {
  const slug = Array.from(article.title.replace(NON_ALNUM, "")).slice(0, 20).join("");
  const digest = crypto.createHash("md5").update(article.body, "utf-8").digest("hex").slice(0, 10);
  return `${slug}_${digest}`;
}
