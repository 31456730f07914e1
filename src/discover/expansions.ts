import tables from "./expansions.json";

export type ExpansionTable = Readonly<Record<string, readonly string[]>>;

export const SYNONYMS: ExpansionTable = tables.synonyms;
export const RELATED_TOPICS: ExpansionTable = tables.relatedTopics;

const MAX_SYNONYM_VARIANTS = 3;
const MAX_RELATED_PHRASES = 2;

function queryWords(query: string): string[] {
  return query.split(/\s+/).filter((word) => word.length > 0);
}

/** Query variants with one known word swapped for a synonym (first occurrence only). */
export function synonymVariants(query: string, table: ExpansionTable = SYNONYMS): string[] {
  const variants: string[] = [];
  for (const word of queryWords(query)) {
    const synonyms = table[word.toLowerCase()] ?? [];
    for (const synonym of synonyms) {
      const variant = query.replace(word, synonym);
      if (variant !== query && !variants.includes(variant)) {
        variants.push(variant);
      }
    }
  }
  return variants.slice(0, MAX_SYNONYM_VARIANTS);
}

export function relatedPhrases(query: string, table: ExpansionTable = RELATED_TOPICS): string[] {
  const phrases: string[] = [];
  for (const word of queryWords(query)) {
    for (const phrase of table[word.toLowerCase()] ?? []) {
      if (!phrases.includes(phrase)) {
        phrases.push(phrase);
      }
    }
  }
  return phrases.slice(0, MAX_RELATED_PHRASES);
}
