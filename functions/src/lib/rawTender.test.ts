import { describe, expect, it } from "vitest";
import {
  normalizeCpv,
  normalizeRawTender,
  parseAmount,
  parseItalianDate,
} from "./rawTender";

describe("rawTender", () => {
  it("parses Italian currency amounts", () => {
    expect(parseAmount("€ 1.500.000,00")).toBe(1500000);
    expect(parseAmount("EUR 2.000,5")).toBe(2000.5);
    expect(parseAmount("1.500")).toBe(1500);
    expect(parseAmount("1500.50")).toBe(1500.5);
    expect(parseAmount(42)).toBe(42);
  });

  it("drops amounts it cannot read", () => {
    expect(parseAmount("n/d")).toBeUndefined();
    expect(parseAmount("")).toBeUndefined();
    expect(parseAmount(null)).toBeUndefined();
  });

  it("parses portal dates to ISO", () => {
    expect(parseItalianDate("15/03/2025")).toBe("2025-03-15");
    expect(parseItalianDate("15-03-2025 12:30")).toBe("2025-03-15T12:30:00");
    expect(parseItalianDate("1/2/25")).toBe("2025-02-01");
    expect(parseItalianDate("2025-03-15")).toBe("2025-03-15");
    expect(parseItalianDate("2025-03-15T10:00:00Z")).toBe("2025-03-15T10:00:00");
  });

  it("applies a UTC offset to ISO timestamps", () => {
    expect(parseItalianDate("2025-03-01T10:00:00+02:00")).toBe("2025-03-01T08:00:00");
    expect(parseItalianDate("2025-03-01T23:30:00-01:00")).toBe("2025-03-02T00:30:00");
    expect(parseItalianDate("2025-03-01 10:00+0530")).toBe("2025-03-01T04:30:00");
  });

  it("rejects impossible or free-text dates", () => {
    expect(parseItalianDate("31/02/2025")).toBeUndefined();
    expect(parseItalianDate("15/03/2025 25:00")).toBeUndefined();
    expect(parseItalianDate("domani")).toBeUndefined();
  });

  it("sorts and de-duplicates CPV codes", () => {
    expect(normalizeCpv("45000000-7; 45200000-9,45000000-7")).toBe("45000000-7,45200000-9");
    expect(normalizeCpv(["b", "a"])).toBe("a,b");
    expect(normalizeCpv(" ; ")).toBeUndefined();
  });

  it("normalizes a raw field set and keeps unknown keys as extras", () => {
    const n = normalizeRawTender({
      title: "  Lavori   di manutenzione ",
      cig: "ab12345678",
      amount: "€ 10.000,00",
      deadline: "31/12/2025 12:00",
      publicationDate: "not a date",
      numLots: "3",
      cpvCodes: ["45000000-7"],
      regione: "Lombardia",
      pages: 2,
      attachments: [{ url: "https://ex.it/a.pdf", fileName: "Disciplinare.pdf" }],
    });

    expect(n.fields).toEqual({
      title: "Lavori di manutenzione",
      amount: 10000,
      deadline: "2025-12-31T12:00:00",
      numLots: 3,
      cpvCodes: "45000000-7",
    });
    expect(n.referenceCode).toBe("ab12345678");
    expect(n.bandoNumber).toBeNull();
    expect(n.url).toBeNull();
    expect(n.extras).toEqual({ regione: "Lombardia", pages: "2" });
    expect(n.attachments).toEqual([
      { url: "https://ex.it/a.pdf", fileName: "Disciplinare.pdf" },
    ]);
    expect(n.warnings).toEqual(["unparseable publicationDate: not a date"]);
  });

  it("drops malformed attachment entries and keeps the tender", () => {
    const n = normalizeRawTender({
      cig: "A123456789",
      attachments: [
        { url: "", fileName: "Bando.pdf" },
        { fileName: "Senza link.pdf" },
        { url: " https://ex.it/b.pdf " },
      ],
    });
    expect(n.referenceCode).toBe("A123456789");
    expect(n.attachments).toEqual([{ url: "https://ex.it/b.pdf" }]);
    expect(n.warnings).toEqual(["invalid attachment 0: url", "invalid attachment 1: url"]);

    expect(normalizeRawTender({ cig: "A123456789", attachments: "bando.pdf" }).warnings).toEqual([
      "attachments is not a list",
    ]);
  });

  it("prefers referenceCode over the cig alias", () => {
    const n = normalizeRawTender({ referenceCode: "ZZ00000001", cig: "AA00000001" });
    expect(n.referenceCode).toBe("ZZ00000001");
  });

  it("rejects input that is not a field set", () => {
    expect(() => normalizeRawTender("nope")).toThrow();
    expect(() => normalizeRawTender({ amount: { value: 1 } })).toThrow();
  });
});
