import type {
  Attachment,
  EnrichmentRecord,
  LifecycleStatus,
  ScrapeRun,
  Tender,
} from "./types";

export type StoreStatistics = {
  totalTenders: number;
  byLifecycle: Record<LifecycleStatus, number>;
  totalAttachments: number;
  downloadedAttachments: number;
  enrichmentComplete: number;
  enrichmentFailed: number;
  avgQuality: number;
  platformBreakdown: Record<string, number>;
};

/**
 * Persistence for tenders and everything they own. `updateTender` is the
 * only write path for a tender and runs as one atomic read-modify-write.
 */
export interface TenderStore {
  getTender(platform: string, key: string): Promise<Tender | null>;
  /** `mutate` returns the record to write, or null to leave it untouched. */
  updateTender(
    platform: string,
    key: string,
    mutate: (current: Tender | null) => Tender | null
  ): Promise<Tender | null>;
  listTenders(platform: string): Promise<Tender[]>;
  /** Removes the tender with its attachments and enrichment record. */
  deleteTender(platform: string, key: string): Promise<void>;

  listAttachments(platform: string, key: string): Promise<Attachment[]>;
  putAttachment(platform: string, att: Attachment): Promise<void>;
  clearAttachments(platform: string, key: string): Promise<void>;

  getEnrichment(platform: string, key: string): Promise<EnrichmentRecord | null>;
  putEnrichment(record: EnrichmentRecord): Promise<void>;

  saveScrapeRun(run: ScrapeRun): Promise<ScrapeRun>;
  listScrapeRuns(platform?: string, limit?: number): Promise<ScrapeRun[]>;
  getStatistics(): Promise<StoreStatistics>;
}

/** Persistence layer failure; fatal for the whole run. */
export class StoreError extends Error {
  constructor(
    readonly op: string,
    cause: unknown
  ) {
    super(
      `store ${op} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "StoreError";
  }
}

export function tenderDocId(platform: string, key: string) {
  const ns = platform.trim().toUpperCase().replace(/[^A-Z0-9]+/g, "_");
  return `${ns}-${key.replace(/[^A-Za-z0-9_-]+/g, "_")}`;
}

export function emptyEnrichment(tender: Tender): EnrichmentRecord {
  return {
    tenderKey: tender.identityKey,
    platform: tender.platform,
    sections: null,
    rawText: null,
    sourceDocuments: [],
    aiOutput: null,
    aiSkippedReason: null,
    confidenceScore: null,
    failureReason: null,
    extractedAt: null,
    enrichedAt: null,
  };
}

export function summarize(
  tenders: Tender[],
  attachments: Attachment[]
): StoreStatistics {
  const byLifecycle: Record<LifecycleStatus, number> = {
    Active: 0,
    Updated: 0,
    Closed: 0,
  };
  const platformBreakdown: Record<string, number> = {};
  let quality = 0;
  for (const t of tenders) {
    byLifecycle[t.lifecycleStatus] += 1;
    platformBreakdown[t.platform] = (platformBreakdown[t.platform] ?? 0) + 1;
    quality += t.qualityScore;
  }
  return {
    totalTenders: tenders.length,
    byLifecycle,
    totalAttachments: attachments.length,
    downloadedAttachments: attachments.filter((a) => a.downloadStatus === "Downloaded")
      .length,
    enrichmentComplete: tenders.filter((t) => t.stage === "Complete").length,
    enrichmentFailed: tenders.filter((t) => t.stage === "Failed").length,
    avgQuality: tenders.length ? Math.round((quality / tenders.length) * 1000) / 1000 : 0,
    platformBreakdown,
  };
}
