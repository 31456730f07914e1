export { CandidateSet, DiscoveryEngine, buildSearchUrl } from "./discovery";
export type { DiscoverOptions, DiscoveryDeps, DiscoveryStrategy } from "./discovery";
export { RELATED_TOPICS, SYNONYMS, relatedPhrases, synonymVariants } from "./expansions";
export type { ExpansionTable } from "./expansions";
export { extractMatchingLinks, extractNextPageUrl, extractSearchResults, isContentAddress } from "./htmlParser";
