import { describe, expect, it } from "vitest";
import { createKeywordAnalyzer, locateSection, mergeSections } from "./textAnalyzer";

const LINES = [
  "Premessa generale del documento di gara.",
  "Art. 5 - Requisiti di partecipazione",
  "Gli operatori devono possedere iscrizione alla CCIAA e certificazione ISO 9001.",
  "Fatturato minimo annuo pari a 500.000 euro negli ultimi tre esercizi.",
];
const TEXT = LINES.join("\n");

const LIMITS = { maxSectionLength: 3000, maxRawTextLength: 50000 };

describe("textAnalyzer", () => {
  it("returns the lines around a keyword hit", () => {
    expect(locateSection(TEXT, ["REQUISITI"])).toBe(TEXT);
  });

  it("does not repeat an identical context window", () => {
    const text = [...LINES.slice(0, 3), "Ulteriori requisiti tecnici.", LINES[3]].join("\n");
    expect(locateSection(text, ["requisiti"])).toBe(text);
  });

  it("ignores short or missing spans", () => {
    expect(locateSection("Requisiti: nessuno", ["requisiti"])).toBeNull();
    expect(locateSection(TEXT, ["garanzia"])).toBeNull();
  });

  it("caps a span at 2000 characters", () => {
    const span = locateSection(`requisiti ${"a".repeat(3000)}`, ["requisiti"]);
    expect(span).toHaveLength(2003);
    expect(span?.endsWith("...")).toBe(true);
  });

  it("labels the spans it finds", async () => {
    const analyzer = createKeywordAnalyzer({
      qualifications: ["requisiti"],
      evaluationCriteria: ["criteri di valutazione"],
      processDescription: ["procedura aperta"],
      deliveryTerms: ["consegna"],
    });
    expect(await analyzer.analyze(TEXT)).toEqual({ qualifications: TEXT });
    expect(await analyzer.analyze("nessuna sezione")).toBeNull();
  });

  it("merges sections by category with source headers", () => {
    const merged = mergeSections(
      [
        { source: "a.pdf", text: "x".repeat(600), sections: { qualifications: "Q1" } },
        {
          source: "b.pdf",
          text: "short",
          sections: { qualifications: "Q2", deliveryTerms: "D2" },
        },
        { source: "c.txt", text: "y".repeat(501), sections: null },
      ],
      LIMITS
    );
    expect(merged.sections).toEqual({
      qualifications: "[From a.pdf]\nQ1\n\n---\n\n[From b.pdf]\nQ2",
      evaluationCriteria: null,
      processDescription: null,
      deliveryTerms: "[From b.pdf]\nD2",
    });
    expect(merged.rawText).toBe(`${"x".repeat(600)}\n\n${"y".repeat(501)}`);
  });

  it("caps merged sections and raw text", () => {
    const merged = mergeSections(
      [{ source: "a.pdf", text: "x".repeat(600), sections: { qualifications: "Q1" } }],
      { maxSectionLength: 10, maxRawTextLength: 100 }
    );
    expect(merged.sections.qualifications).toBe("[From a.pd...");
    expect(merged.rawText).toHaveLength(100);
  });

  it("leaves every category empty without documents", () => {
    expect(mergeSections([], LIMITS)).toEqual({
      sections: {
        qualifications: null,
        evaluationCriteria: null,
        processDescription: null,
        deliveryTerms: null,
      },
      rawText: null,
    });
  });
});
