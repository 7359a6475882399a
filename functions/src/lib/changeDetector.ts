import {
  CHANGE_SIGNIFICANT_FIELDS,
  compactFields,
  computeQualityScore,
  isPopulated,
  mergeFields,
} from "./fields";
import type {
  ChangeOutcome,
  Tender,
  TenderFieldName,
  TenderFields,
} from "./types";

export type Observation = {
  platform: string;
  identityKey: string;
  url: string | null;
  fields: TenderFields;
  extras: Record<string, string>;
  seenAt: string;
};

export type Reconciled = {
  outcome: ChangeOutcome;
  /** A Closed tender seen again; it restarts as a fresh Active occurrence. */
  reopened: boolean;
  changed: TenderFieldName[];
  tender: Tender;
};

const DATE_KEYS = new Set<TenderFieldName>([
  "publicationDate",
  "deadline",
  "evaluationDate",
]);

function sameValue(
  key: TenderFieldName,
  a: string | number | undefined,
  b: string | number | undefined
) {
  if (
    DATE_KEYS.has(key) &&
    typeof a === "string" &&
    typeof b === "string" &&
    (a.length === 10 || b.length === 10)
  ) {
    // a date-only value says nothing about the time of day
    return a.slice(0, 10) === b.slice(0, 10);
  }
  return a === b;
}

/** Change-significant fields whose incoming value is known and differs. */
export function changedSignificantFields(
  prev: TenderFields,
  next: TenderFields
): TenderFieldName[] {
  return CHANGE_SIGNIFICANT_FIELDS.filter((k) => {
    const incoming = next[k];
    if (!isPopulated(incoming)) return false;
    return !sameValue(k, prev[k], incoming);
  });
}

export function freshTender(obs: Observation): Tender {
  const fields = compactFields(obs.fields);
  return {
    identityKey: obs.identityKey,
    platform: obs.platform,
    url: obs.url,
    fields,
    extras: obs.extras,
    qualityScore: computeQualityScore(fields),
    lifecycleStatus: "Active",
    stage: "New",
    failure: null,
    retryCount: 0,
    missingStreak: 0,
    firstSeenAt: obs.seenAt,
    lastSeenAt: obs.seenAt,
    lastChangedAt: obs.seenAt,
  };
}

/**
 * Classifies a scraped observation against the stored tender and returns the
 * record to persist. With `now`, a Closed tender whose observed deadline has
 * passed stays Closed instead of coming back.
 */
export function reconcile(
  obs: Observation,
  existing: Tender | null,
  now?: Date
): Reconciled {
  if (!existing) {
    return { outcome: "New", reopened: false, changed: [], tender: freshTender(obs) };
  }
  if (existing.lifecycleStatus === "Closed") {
    const fresh = freshTender(obs);
    if (now && isExpired(fresh, now)) {
      return {
        outcome: "Unchanged",
        reopened: false,
        changed: [],
        tender: { ...existing, lastSeenAt: obs.seenAt },
      };
    }
    return { outcome: "New", reopened: true, changed: [], tender: fresh };
  }

  const changed = changedSignificantFields(existing.fields, obs.fields);
  if (!changed.length) {
    return {
      outcome: "Unchanged",
      reopened: false,
      changed,
      tender: {
        ...existing,
        qualityScore: computeQualityScore(existing.fields),
        missingStreak: 0,
        lastSeenAt: obs.seenAt,
      },
    };
  }

  const fields = compactFields(mergeFields(existing.fields, obs.fields));
  return {
    outcome: "Updated",
    reopened: false,
    changed,
    tender: {
      ...existing,
      url: existing.url ?? obs.url,
      fields,
      extras: { ...existing.extras, ...obs.extras },
      qualityScore: computeQualityScore(fields),
      lifecycleStatus: "Updated",
      missingStreak: 0,
      lastSeenAt: obs.seenAt,
      lastChangedAt: obs.seenAt,
    },
  };
}

/**
 * One more full pass without this tender. It turns Closed once the streak
 * reaches `threshold`; before that its status is left alone.
 */
export function markMissing(
  tender: Tender,
  threshold: number,
  now: string
): { tender: Tender; closed: boolean } {
  if (tender.lifecycleStatus === "Closed") return { tender, closed: false };
  const missingStreak = tender.missingStreak + 1;
  if (missingStreak >= Math.max(1, threshold)) {
    return {
      tender: { ...tender, missingStreak, lifecycleStatus: "Closed", lastChangedAt: now },
      closed: true,
    };
  }
  return { tender: { ...tender, missingStreak }, closed: false };
}

export function isExpired(tender: Tender, now: Date): boolean {
  const deadline = tender.fields.deadline;
  if (!deadline) return false;
  // date-only deadlines stay open for the whole day
  const at =
    deadline.length === 10
      ? Date.parse(`${deadline}T23:59:59Z`)
      : Date.parse(`${deadline}Z`);
  return Number.isFinite(at) && at < now.getTime();
}
