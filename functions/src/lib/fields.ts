import type { TenderFieldName, TenderFields } from "./types";

export const TRACKED_FIELDS: readonly TenderFieldName[] = [
  "title",
  "amount",
  "procedureType",
  "category",
  "placeOfExecution",
  "contractingAuthority",
  "cpvCodes",
  "publicationDate",
  "deadline",
  "evaluationDate",
  "status",
  "sectorType",
  "awardCriterion",
  "contractDuration",
  "numLots",
  "email",
  "rupName",
];

/** Fields whose change marks a tender as Updated. */
export const CHANGE_SIGNIFICANT_FIELDS: readonly TenderFieldName[] = [
  "deadline",
  "amount",
  "status",
  "publicationDate",
];

export function isPopulated(v: unknown): boolean {
  if (typeof v === "number") return Number.isFinite(v);
  if (typeof v === "string") return v.trim().length > 0;
  return false;
}

export function computeQualityScore(fields: TenderFields): number {
  const filled = TRACKED_FIELDS.filter((k) => isPopulated(fields[k])).length;
  return filled / TRACKED_FIELDS.length;
}

/**
 * Overlay `next` on `prev`. An empty value in `next` carries no information
 * and never replaces a known one.
 */
export function mergeFields(
  prev: TenderFields,
  next: TenderFields
): TenderFields {
  const out: TenderFields = { ...prev };
  for (const k of TRACKED_FIELDS) {
    const v = next[k];
    if (isPopulated(v)) assignField(out, k, v);
  }
  return out;
}

export function assignField(
  target: TenderFields,
  key: TenderFieldName,
  value: string | number | undefined
) {
  if (key === "amount" || key === "numLots") {
    if (typeof value === "number") target[key] = value;
    return;
  }
  if (typeof value === "string") target[key] = value;
}

/** Drops blank values so stored documents only hold populated fields. */
export function compactFields(fields: TenderFields): TenderFields {
  const out: TenderFields = {};
  for (const k of TRACKED_FIELDS) {
    const v = fields[k];
    if (isPopulated(v)) assignField(out, k, v);
  }
  return out;
}
