import { load } from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import { hasChildren, isTag, isText } from "domhandler";
import type { AnyNode, Element } from "domhandler";

const BLOCK_TAGS = new Set([
  "address",
  "article",
  "aside",
  "blockquote",
  "dd",
  "div",
  "dl",
  "dt",
  "fieldset",
  "figcaption",
  "figure",
  "footer",
  "form",
  "h1",
  "h2",
  "h3",
  "h4",
  "h5",
  "h6",
  "header",
  "hr",
  "li",
  "main",
  "nav",
  "ol",
  "p",
  "pre",
  "section",
  "table",
  "tr",
  "ul",
]);

const HIDDEN_TAGS = new Set(["script", "style", "noscript", "template", "head"]);

export function loadDocument(html: string): CheerioAPI {
  return load(html);
}

/** `scope.find(selector)`, with a malformed selector treated as matching nothing. */
export function findWithin<T extends AnyNode>(scope: Cheerio<T>, selector: string): Cheerio<Element> {
  try {
    return scope.find(selector);
  } catch {
    return scope.children().slice(0, 0);
  }
}

export function selectAll($: CheerioAPI, selector: string): Cheerio<Element> {
  return findWithin($.root(), selector);
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function appendText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    parts.push(node.data);
    return;
  }
  if (!isTag(node)) {
    if (hasChildren(node)) {
      for (const child of node.children) {
        appendText(child, parts);
      }
    }
    return;
  }

  const tag = node.name.toLowerCase();
  if (HIDDEN_TAGS.has(tag)) {
    return;
  }
  if (tag === "br") {
    parts.push("\n");
    return;
  }

  const block = BLOCK_TAGS.has(tag);
  if (block) {
    parts.push("\n");
  }
  for (const child of node.children) {
    appendText(child, parts);
  }
  if (block) {
    parts.push("\n");
  }
}

/**
 * Approximates the rendered text of an element: block boundaries and `<br>` become
 * line breaks, whitespace inside a line collapses, hidden elements are skipped.
 */
export function renderText<T extends AnyNode>(selection: Cheerio<T>): string {
  const parts: string[] = [];
  selection.each((_, node) => {
    appendText(node, parts);
  });

  return parts
    .join("")
    .split("\n")
    .map((line) => line.replace(/[ \t\r\f\v\u00a0]+/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/** Single-line visible text, for titles, link labels and metadata values. */
export function inlineText<T extends AnyNode>(selection: Cheerio<T>): string {
  return collapseWhitespace(renderText(selection));
}
