import type { CheerioAPI } from "cheerio";
import { isTag } from "domhandler";
import type { Element } from "domhandler";
import { SelectorConfig, SelectorList } from "../config";
import { inlineText, loadDocument, renderText, selectAll } from "../core/dom";
import { ArticleMetadata } from "../types";
import { cleanText } from "./cleanText";

export const TITLE_NOT_FOUND = "Untitled article";
export const CONTENT_NOT_FOUND = "Content not found";

const MIN_TITLE_LENGTH = 5;
const MIN_CONTENT_LENGTH = 100;

const FALLBACK_TITLE_SELECTORS = ["h1", "h2", ".title", ".header", ".page-title", '[class*="title"]', '[class*="header"]'];
const FALLBACK_CONTENT_SELECTORS = [
  "article",
  ".content",
  ".post-content",
  ".main-content",
  ".body-content",
  ".text-content",
  '[class*="content"]',
  '[class*="article"]',
  '[class*="post"]',
];

export interface ParsedArticlePage {
  title: string;
  body: string;
  metadata: ArticleMetadata;
  tags: string[];
}

function cascade(primary: SelectorList, fallback: readonly string[]): string[] {
  return [...new Set([...primary, ...fallback])];
}

export function extractTitle($: CheerioAPI, selectors: SelectorList): string {
  for (const selector of cascade(selectors, FALLBACK_TITLE_SELECTORS)) {
    const elements = selectAll($, selector).toArray();
    for (const element of elements) {
      const title = inlineText($(element));
      if (title.length > MIN_TITLE_LENGTH) {
        return title;
      }
    }
  }
  return TITLE_NOT_FOUND;
}

function hasSelectedAncestor(element: Element, selected: ReadonlySet<Element>): boolean {
  let current = element.parent;
  while (current) {
    if (isTag(current) && selected.has(current)) {
      return true;
    }
    current = current.parent;
  }
  return false;
}

/**
 * Text of every content container long enough to be real content, in document order.
 * A container nested inside another match contributes through its ancestor only.
 */
export function extractBody($: CheerioAPI, selectors: SelectorList): string {
  const matched = new Set<Element>();
  for (const selector of cascade(selectors, FALLBACK_CONTENT_SELECTORS)) {
    for (const element of selectAll($, selector).toArray()) {
      matched.add(element);
    }
  }

  const parts: string[] = [];
  const taken = new Set<Element>();
  for (const element of selectAll($, "*").toArray()) {
    if (!matched.has(element) || hasSelectedAncestor(element, taken)) {
      continue;
    }
    const text = renderText($(element));
    if (text.length > MIN_CONTENT_LENGTH) {
      parts.push(text);
      taken.add(element);
    }
  }

  if (parts.length === 0) {
    const bodyText = renderText($("body"));
    parts.push(bodyText || renderText($.root()));
  }

  return cleanText(parts.join("\n\n")) || CONTENT_NOT_FOUND;
}

function firstText($: CheerioAPI, selectors: SelectorList): string | undefined {
  for (const selector of selectors) {
    const first = selectAll($, selector).first();
    if (first.length === 0) {
      continue;
    }
    const text = inlineText(first);
    if (text) {
      return text;
    }
  }
  return undefined;
}

export function extractMetadata($: CheerioAPI, selectors: SelectorConfig): ArticleMetadata {
  const metadata: ArticleMetadata = {};
  const date = firstText($, selectors.metadataDate);
  const author = firstText($, selectors.metadataAuthor);
  const category = firstText($, selectors.metadataCategory);
  if (date) {
    metadata.date = date;
  }
  if (author) {
    metadata.author = author;
  }
  if (category) {
    metadata.category = category;
  }
  return metadata;
}

export function extractTags($: CheerioAPI, selectors: SelectorList): string[] {
  const tags: string[] = [];
  for (const selector of selectors) {
    for (const element of selectAll($, selector).toArray()) {
      const tag = inlineText($(element));
      if (tag && !tags.includes(tag)) {
        tags.push(tag);
      }
    }
    if (tags.length > 0) {
      break;
    }
  }
  return tags;
}

export function parseArticlePage(html: string, selectors: SelectorConfig): ParsedArticlePage {
  const $ = loadDocument(html);
  return {
    title: extractTitle($, selectors.articleTitle),
    body: extractBody($, selectors.articleContent),
    metadata: extractMetadata($, selectors),
    tags: extractTags($, selectors.tags),
  };
}
