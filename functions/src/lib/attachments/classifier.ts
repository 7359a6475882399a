import type { AttachmentCategory } from "../types";

export type ClassifierKeywords = {
  compilable: readonly string[];
  informative: readonly string[];
};

export type Classification = {
  category: AttachmentCategory;
  confidence: number;
};

function distinctHits(name: string, words: readonly string[]) {
  const hits = new Set<string>();
  for (const w of words) {
    const kw = w.trim().toLowerCase();
    if (kw && name.includes(kw)) hits.add(kw);
  }
  return hits.size;
}

/**
 * Compilable (forms to fill in) vs Informative (documents to read), from the
 * file name or link text. Ties, including no hits at all, are Unclassified.
 */
export function classifyAttachment(
  name: string,
  keywords: ClassifierKeywords
): Classification {
  const lower = name.toLowerCase();
  const compilable = distinctHits(lower, keywords.compilable);
  const informative = distinctHits(lower, keywords.informative);
  const diff = Math.abs(compilable - informative);
  // 0.5 + 0.1 per hit of difference, capped at 0.9
  const confidence = Math.min(0.9, Math.round((0.5 + 0.1 * diff) * 100) / 100);

  if (compilable > informative) return { category: "Compilable", confidence };
  if (informative > compilable) return { category: "Informative", confidence };
  return { category: "Unclassified", confidence: 0 };
}
