const SCRIPT_BLOCK = /<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi;
const STYLE_BLOCK = /<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi;
const MARKUP_TAG = /<[^>]+>/g;
const DISALLOWED_CHARS = /[^\p{L}\p{N}_\s.,!?;:()–—-]/gu;
const BLANK_LINE_RUN = /\n\s*\n/g;
const HORIZONTAL_WHITESPACE = /[ \t]+/g;

/**
 * Normalizes extracted page text. Markup and disallowed characters are removed before
 * whitespace is collapsed, so `cleanText(cleanText(x)) === cleanText(x)`.
 */
export function cleanText(text: string): string {
  if (!text) {
    return "";
  }

  return text
    .replace(SCRIPT_BLOCK, "")
    .replace(STYLE_BLOCK, "")
    .replace(MARKUP_TAG, "")
    .replace(DISALLOWED_CHARS, "")
    .replace(BLANK_LINE_RUN, "\n\n")
    .replace(HORIZONTAL_WHITESPACE, " ")
    .trim();
}
