import { z } from "zod";
import { assignField } from "./fields";
import type { TenderFieldName, TenderFields } from "./types";

const scalar = z.union([z.string(), z.number()]).nullish();

export const rawAttachmentSchema = z.object({
  url: z.string().trim().min(1),
  fileName: z.string().nullish(),
});

/**
 * One tender as handed over by a platform scraper. Known keys are typed;
 * anything else lands in the extras bag.
 */
export const rawTenderSchema = z
  .object({
    title: scalar,
    url: z.string().nullish(),
    referenceCode: scalar,
    cig: scalar,
    bandoNumber: scalar,
    amount: scalar,
    procedureType: scalar,
    category: scalar,
    placeOfExecution: scalar,
    contractingAuthority: scalar,
    cpvCodes: z.union([z.string(), z.array(z.string())]).nullish(),
    publicationDate: scalar,
    deadline: scalar,
    evaluationDate: scalar,
    status: scalar,
    sectorType: scalar,
    awardCriterion: scalar,
    contractDuration: scalar,
    numLots: scalar,
    email: scalar,
    rupName: scalar,
    // checked entry by entry in normalizeRawTender
    attachments: z.unknown(),
  })
  .passthrough();

export type RawTender = z.input<typeof rawTenderSchema>;
export type RawAttachment = z.infer<typeof rawAttachmentSchema>;

export type NormalizedTender = {
  url: string | null;
  referenceCode: string | null;
  bandoNumber: string | null;
  fields: TenderFields;
  extras: Record<string, string>;
  attachments: RawAttachment[];
  warnings: string[];
};

const KNOWN_KEYS = new Set(Object.keys(rawTenderSchema.shape));

const TEXT_FIELDS = [
  "title",
  "procedureType",
  "category",
  "placeOfExecution",
  "contractingAuthority",
  "status",
  "sectorType",
  "awardCriterion",
  "contractDuration",
  "email",
  "rupName",
] as const satisfies readonly TenderFieldName[];

const DATE_FIELDS = ["publicationDate", "deadline", "evaluationDate"] as const;

function text(v: string | number | null | undefined): string | undefined {
  if (v === null || v === undefined) return undefined;
  const s = String(v).replace(/\s+/g, " ").trim();
  return s ? s : undefined;
}

/** "€ 1.500.000,00" → 1500000 */
export function parseAmount(v: string | number | null | undefined) {
  if (typeof v === "number") return Number.isFinite(v) ? v : undefined;
  const s = text(v);
  if (!s) return undefined;
  let cleaned = s.replace(/[€\s]|EUR/gi, "");
  if (cleaned.includes(",")) {
    cleaned = cleaned.replace(/\./g, "").replace(",", ".");
  } else if (/^\d{1,3}(\.\d{3})+$/.test(cleaned)) {
    cleaned = cleaned.replace(/\./g, "");
  }
  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) return undefined;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : undefined;
}

function pad(n: number) {
  return String(n).padStart(2, "0");
}

function buildIso(
  y: number,
  mo: number,
  d: number,
  time?: { h: number; mi: number; s: number }
) {
  const probe = new Date(Date.UTC(y, mo - 1, d));
  if (
    probe.getUTCFullYear() !== y ||
    probe.getUTCMonth() !== mo - 1 ||
    probe.getUTCDate() !== d
  )
    return undefined;
  const date = `${y}-${pad(mo)}-${pad(d)}`;
  if (!time) return date;
  if (time.h > 23 || time.mi > 59 || time.s > 59) return undefined;
  return `${date}T${pad(time.h)}:${pad(time.mi)}:${pad(time.s)}`;
}

/**
 * Italian portal dates to ISO. Date-only input gives `YYYY-MM-DD`, input
 * with a time gives `YYYY-MM-DDTHH:mm:ss`. A UTC offset, when given, is
 * applied so the result reads as UTC.
 */
export function parseItalianDate(v: string | number | null | undefined) {
  const s = text(v);
  if (!s) return undefined;

  const it = s.match(
    /^(\d{1,2})[/-](\d{1,2})[/-](\d{2}|\d{4})(?:[ T,]+(\d{1,2})[:.](\d{2})(?:[:.](\d{2}))?)?$/
  );
  if (it) {
    const year = it[3].length === 2 ? 2000 + Number(it[3]) : Number(it[3]);
    const time =
      it[4] !== undefined
        ? { h: Number(it[4]), mi: Number(it[5]), s: Number(it[6] ?? 0) }
        : undefined;
    return buildIso(year, Number(it[2]), Number(it[1]), time);
  }

  const iso = s.match(
    /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?(Z|([+-])(\d{2}):?(\d{2}))?)?$/
  );
  if (iso) {
    const time =
      iso[4] !== undefined
        ? { h: Number(iso[4]), mi: Number(iso[5]), s: Number(iso[6] ?? 0) }
        : undefined;
    const local = buildIso(Number(iso[1]), Number(iso[2]), Number(iso[3]), time);
    if (!local || !time || iso[7] === undefined || iso[7] === "Z") return local;
    const offsetMin = (iso[8] === "-" ? -1 : 1) * (Number(iso[9]) * 60 + Number(iso[10]));
    return new Date(Date.parse(`${local}Z`) - offsetMin * 60_000).toISOString().slice(0, 19);
  }
  return undefined;
}

export function normalizeCpv(v: string | string[] | null | undefined) {
  if (v === null || v === undefined) return undefined;
  const parts = (Array.isArray(v) ? v : v.split(/[,;]/))
    .map((c) => c.trim())
    .filter(Boolean);
  if (!parts.length) return undefined;
  return Array.from(new Set(parts)).sort().join(",");
}

function parseCount(v: string | number | null | undefined) {
  if (typeof v === "number") return Number.isInteger(v) ? v : undefined;
  const s = text(v);
  if (!s || !/^\d+$/.test(s)) return undefined;
  return Number(s);
}

function stringifyExtra(v: unknown): string | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  try {
    return JSON.stringify(v);
  } catch {
    return undefined;
  }
}

function collectAttachments(value: unknown, warnings: string[]): RawAttachment[] {
  if (value === null || value === undefined) return [];
  if (!Array.isArray(value)) {
    warnings.push("attachments is not a list");
    return [];
  }
  const out: RawAttachment[] = [];
  value.forEach((entry: unknown, i) => {
    const parsed = rawAttachmentSchema.safeParse(entry);
    if (parsed.success) {
      out.push(parsed.data);
      return;
    }
    const where = parsed.error.issues.map((issue) => issue.path.join(".") || "entry");
    warnings.push(`invalid attachment ${i}: ${where.join(", ")}`);
  });
  return out;
}

/**
 * Validates a raw field set and converts it to the fixed tender schema.
 * Values that cannot be parsed are dropped and reported in `warnings`.
 */
export function normalizeRawTender(input: unknown): NormalizedTender {
  const raw = rawTenderSchema.parse(input);
  const warnings: string[] = [];
  const fields: TenderFields = {};

  for (const k of TEXT_FIELDS) assignField(fields, k, text(raw[k]));

  const amount = parseAmount(raw.amount);
  if (amount === undefined && text(raw.amount))
    warnings.push(`unparseable amount: ${text(raw.amount)}`);
  assignField(fields, "amount", amount);

  const lots = parseCount(raw.numLots);
  if (lots === undefined && text(raw.numLots))
    warnings.push(`unparseable numLots: ${text(raw.numLots)}`);
  assignField(fields, "numLots", lots);

  for (const k of DATE_FIELDS) {
    const parsed = parseItalianDate(raw[k]);
    if (parsed === undefined && text(raw[k]))
      warnings.push(`unparseable ${k}: ${text(raw[k])}`);
    assignField(fields, k, parsed);
  }

  assignField(fields, "cpvCodes", normalizeCpv(raw.cpvCodes));

  const attachments = collectAttachments(raw.attachments, warnings);

  const extras: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw)) {
    if (KNOWN_KEYS.has(k)) continue;
    const s = stringifyExtra(v);
    if (s !== undefined) extras[k] = s;
  }

  return {
    url: text(raw.url) ?? null,
    referenceCode: text(raw.referenceCode) ?? text(raw.cig) ?? null,
    bandoNumber: text(raw.bandoNumber) ?? null,
    fields,
    extras,
    attachments,
    warnings,
  };
}
