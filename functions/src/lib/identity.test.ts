import { describe, expect, it } from "vitest";
import { DEFAULT_PIPELINE_CONFIG, identityRuleFor } from "./config";
import { hashUrl, IdentityError, normalizeUrl, resolveIdentity } from "./identity";

describe("identity", () => {
  it("strips session and tracking noise from detail URLs", () => {
    expect(
      normalizeUrl("HTTPS://Example.com/Bandi/123/?utm_source=x&b=2&a=1&jsessionid=ABC#top")
    ).toBe("https://example.com/bandi/123?a=1&b=2");
    expect(normalizeUrl("https://ex.it/dettaglio;jsessionid=XYZ?id=5")).toBe(
      "https://ex.it/dettaglio?id=5"
    );
  });

  it("uses a well-formed reference code first", () => {
    expect(
      resolveIdentity("ARIA", { url: "https://ex.it/t/1", referenceCode: "ab12345678", bandoNumber: "77" })
    ).toEqual({ key: "CIG_AB12345678", source: "reference" });
  });

  it("falls back to the platform-scoped bando number", () => {
    const input = { url: "https://ex.it/t/1", referenceCode: "123", bandoNumber: "0042" };
    expect(resolveIdentity("Sintel Lombardia", input)).toEqual({
      key: "BANDO_SINTEL_LOMBARDIA_42",
      source: "bando",
    });
    expect(resolveIdentity("START", input).key).toBe("BANDO_START_42");
  });

  it("hashes the normalized URL when nothing else is usable", () => {
    const a = resolveIdentity("ARIA", {
      url: "https://ex.it/b?id=1&utm_medium=mail",
      referenceCode: null,
      bandoNumber: "12a",
    });
    const b = resolveIdentity("ARIA", {
      url: "https://EX.it/b/?id=1#frag",
      referenceCode: null,
      bandoNumber: null,
    });
    expect(a.source).toBe("url");
    expect(a.key).toMatch(/^URL_[0-9a-f]{20}$/);
    expect(b.key).toBe(a.key);
    expect(a.key).toBe(`URL_${hashUrl("https://ex.it/b?id=1")}`);
  });

  it("resolves the same input to the same key every time", () => {
    const input = { url: "https://ex.it/gara/9", referenceCode: null, bandoNumber: null };
    const keys = new Set([1, 2, 3].map(() => resolveIdentity("MEPA", input).key));
    expect(keys.size).toBe(1);
  });

  it("throws when no identifier is present", () => {
    expect(() =>
      resolveIdentity("ARIA", { url: null, referenceCode: " ", bandoNumber: null })
    ).toThrow(IdentityError);
  });

  it("applies per-platform reference patterns", () => {
    const rule = identityRuleFor(DEFAULT_PIPELINE_CONFIG, "aria");
    expect(
      resolveIdentity("ARIA", { url: null, referenceCode: "ARIA_2024_15", bandoNumber: null }, rule)
        .key
    ).toBe("CIG_ARIA_2024_15");
    expect(
      resolveIdentity("MEPA", { url: "https://ex.it/x", referenceCode: "ARIA_2024_15", bandoNumber: null })
        .source
    ).toBe("url");
  });
});
