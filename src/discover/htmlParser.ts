import { SelectorList } from "../config";
import { findWithin, inlineText, loadDocument, selectAll } from "../core/dom";
import { SearchCandidate } from "../types";

export const FALLBACK_RESULT_SELECTORS = [".search-result", ".result-item", '[class*="result"]', ".article-item", ".content-item"];

const NEXT_LINK_SELECTORS = ["a[rel='next']", "a.next", "a:contains('Next')", "a:contains('Далее')", "a:contains('›')"];

function normalizeUrl(baseUrl: string, href: string): string | undefined {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return undefined;
  }
}

export function isContentAddress(address: string, contentPathPattern: string): boolean {
  return address.includes(contentPathPattern);
}

/**
 * Scans a search result page with the cascading result selectors. The first selector that
 * yields at least one content link wins; later selectors are not consulted.
 */
export function extractSearchResults(
  html: string,
  pageUrl: string,
  resultSelectors: SelectorList,
  contentPathPattern: string,
): SearchCandidate[] {
  const $ = loadDocument(html);
  const selectors = [...new Set([...resultSelectors, ...FALLBACK_RESULT_SELECTORS])];

  for (const selector of selectors) {
    const candidates: SearchCandidate[] = [];
    for (const node of selectAll($, selector).toArray()) {
      const element = $(node);
      const href = element.is("a") ? element.attr("href") : findWithin(element, "a[href]").first().attr("href");
      const title = inlineText(element);
      if (!href || !title) {
        continue;
      }

      const address = normalizeUrl(pageUrl, href);
      if (address && isContentAddress(address, contentPathPattern)) {
        candidates.push({ title, address });
      }
    }

    if (candidates.length > 0) {
      return candidates;
    }
  }

  return [];
}

/** Every content link on the page whose label mentions the whole query or any of its words. */
export function extractMatchingLinks(html: string, pageUrl: string, query: string, contentPathPattern: string): SearchCandidate[] {
  const $ = loadDocument(html);
  const needle = query.toLowerCase().trim();
  const words = needle.split(/\s+/).filter((word) => word.length > 0);
  if (words.length === 0) {
    return [];
  }

  const candidates: SearchCandidate[] = [];
  for (const node of selectAll($, "a[href]").toArray()) {
    const element = $(node);
    const href = element.attr("href");
    const title = inlineText(element);
    if (!href || !title) {
      continue;
    }

    const address = normalizeUrl(pageUrl, href);
    if (!address || !isContentAddress(address, contentPathPattern)) {
      continue;
    }

    const label = title.toLowerCase();
    if (label.includes(needle) || words.some((word) => label.includes(word))) {
      candidates.push({ title, address });
    }
  }

  return candidates;
}

export function extractNextPageUrl(html: string, pageUrl: string, paginationSelectors: SelectorList): string | undefined {
  const $ = loadDocument(html);

  for (const container of paginationSelectors) {
    for (const linkSelector of NEXT_LINK_SELECTORS) {
      const href = selectAll($, `${container} ${linkSelector}`).first().attr("href");
      if (href) {
        return normalizeUrl(pageUrl, href);
      }
    }
  }

  const explicitNext = selectAll($, "a[rel='next']").first().attr("href");
  return explicitNext ? normalizeUrl(pageUrl, explicitNext) : undefined;
}
