import type { KeywordLists } from "../config";
import type { MergedSections, SectionName } from "../types";

export const SECTION_NAMES: readonly SectionName[] = [
  "qualifications",
  "evaluationCriteria",
  "processDescription",
  "deliveryTerms",
];

/** Labeled spans found in one document; null when none were found. */
export type SectionSpans = Partial<Record<SectionName, string>>;

export interface TextAnalyzer {
  analyze(text: string): Promise<SectionSpans | null>;
}

export type AnalyzedDocument = {
  source: string;
  text: string;
  sections: SectionSpans | null;
};

const CONTEXT_LINES = 5;
const MIN_SPAN = 100;
const MAX_SPAN = 2000;
const RAW_TEXT_MIN_DOC = 500;

const cap = (s: string, max: number) => (s.length > max ? `${s.slice(0, max)}...` : s);

export function locateSection(text: string, keywords: readonly string[]): string | null {
  const words = keywords.map((k) => k.toLowerCase()).filter(Boolean);
  const lines = text.split("\n");
  const spans: string[] = [];

  lines.forEach((line, i) => {
    const lower = line.toLowerCase();
    if (!words.some((w) => lower.includes(w))) return;
    const span = lines
      .slice(Math.max(0, i - CONTEXT_LINES), i + CONTEXT_LINES + 1)
      .join("\n");
    if (!spans.includes(span)) spans.push(span);
  });
  if (!spans.length) return null;

  const combined = cap(
    spans
      .join("\n\n")
      .replace(/\n\s*\n\s*\n+/g, "\n\n")
      .trim(),
    MAX_SPAN
  );
  return combined.length > MIN_SPAN ? combined : null;
}

/** Keyword-driven section locator over the four section keyword lists. */
export function createKeywordAnalyzer(sections: KeywordLists["sections"]): TextAnalyzer {
  return {
    async analyze(text) {
      const out: SectionSpans = {};
      for (const name of SECTION_NAMES) {
        const span = locateSection(text, sections[name]);
        if (span) out[name] = span;
      }
      return Object.keys(out).length ? out : null;
    },
  };
}

export const emptySections = (): MergedSections => ({
  qualifications: null,
  evaluationCriteria: null,
  processDescription: null,
  deliveryTerms: null,
});

/**
 * Merges per-document spans by section. Each section lists its sources under
 * a `[From <file>]` header and is capped at `maxSectionLength`. The raw text
 * keeps only substantial documents, capped at `maxRawTextLength`.
 */
export function mergeSections(
  docs: readonly AnalyzedDocument[],
  limits: { maxSectionLength: number; maxRawTextLength: number }
): { sections: MergedSections; rawText: string | null } {
  const sections = emptySections();
  for (const name of SECTION_NAMES) {
    const parts = docs.flatMap((d) => {
      const content = d.sections?.[name]?.trim();
      return content ? [`[From ${d.source}]\n${content}`] : [];
    });
    if (parts.length) {
      sections[name] = cap(parts.join("\n\n---\n\n"), limits.maxSectionLength);
    }
  }

  const raw = docs
    .filter((d) => d.text.length > RAW_TEXT_MIN_DOC)
    .map((d) => d.text)
    .join("\n\n")
    .slice(0, limits.maxRawTextLength);
  return { sections, rawText: raw || null };
}
