export { articleId, countWords, createArticle, withBody } from "./article";
export type { ArticleInput } from "./article";
export { cleanText } from "./cleanText";
export { ArticleExtractor } from "./extractor";
export type { ExtractorDeps } from "./extractor";
export { CONTENT_NOT_FOUND, TITLE_NOT_FOUND, parseArticlePage } from "./pageParser";
export type { ParsedArticlePage } from "./pageParser";
