import { emptyEnrichment, summarize, tenderDocId } from "./store";
import type { StoreStatistics, TenderStore } from "./store";
import type { Attachment, EnrichmentRecord, ScrapeRun, Tender } from "./types";

const clone = <T>(v: T): T => structuredClone(v);

/**
 * Process-local TenderStore. Mutations run synchronously inside a single
 * tick, so each `updateTender` is atomic without further locking.
 */
export class MemoryTenderStore implements TenderStore {
  private tenders = new Map<string, Tender>();
  private attachments = new Map<string, Map<string, Attachment>>();
  private enrichments = new Map<string, EnrichmentRecord>();
  private runs: ScrapeRun[] = [];

  async getTender(platform: string, key: string) {
    const t = this.tenders.get(tenderDocId(platform, key));
    return t ? clone(t) : null;
  }

  async updateTender(
    platform: string,
    key: string,
    mutate: (current: Tender | null) => Tender | null
  ) {
    const id = tenderDocId(platform, key);
    const current = this.tenders.get(id);
    const next = mutate(current ? clone(current) : null);
    if (!next) return current ? clone(current) : null;
    this.tenders.set(id, clone(next));
    if (!this.enrichments.has(id)) this.enrichments.set(id, emptyEnrichment(next));
    return clone(next);
  }

  async listTenders(platform: string) {
    return [...this.tenders.values()]
      .filter((t) => t.platform === platform)
      .map(clone);
  }

  async deleteTender(platform: string, key: string) {
    const id = tenderDocId(platform, key);
    this.tenders.delete(id);
    this.attachments.delete(id);
    this.enrichments.delete(id);
  }

  async listAttachments(platform: string, key: string) {
    const bucket = this.attachments.get(tenderDocId(platform, key));
    return bucket ? [...bucket.values()].map(clone) : [];
  }

  async putAttachment(platform: string, att: Attachment) {
    const id = tenderDocId(platform, att.tenderKey);
    const bucket = this.attachments.get(id) ?? new Map<string, Attachment>();
    bucket.set(att.id, clone(att));
    this.attachments.set(id, bucket);
  }

  async clearAttachments(platform: string, key: string) {
    this.attachments.delete(tenderDocId(platform, key));
  }

  async getEnrichment(platform: string, key: string) {
    const e = this.enrichments.get(tenderDocId(platform, key));
    return e ? clone(e) : null;
  }

  async putEnrichment(record: EnrichmentRecord) {
    this.enrichments.set(tenderDocId(record.platform, record.tenderKey), clone(record));
  }

  async saveScrapeRun(run: ScrapeRun) {
    const saved = { ...clone(run), id: `run-${this.runs.length + 1}` };
    this.runs.push(saved);
    return clone(saved);
  }

  async listScrapeRuns(platform?: string, limit = 100) {
    return this.runs
      .filter((r) => !platform || r.platform === platform)
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt))
      .slice(0, limit)
      .map(clone);
  }

  async getStatistics(): Promise<StoreStatistics> {
    const atts = [...this.attachments.values()].flatMap((b) => [...b.values()]);
    return summarize([...this.tenders.values()], atts);
  }
}
