import * as logger from "firebase-functions/logger";
import { rm } from "node:fs/promises";
import { downloadDir, registerAttachments } from "./attachments/manager";
import { isExpired, markMissing, reconcile } from "./changeDetector";
import { identityRuleFor } from "./config";
import { canRetry, EnrichmentStateMachine, isRetryDue } from "./enrichment/stateMachine";
import { resolveIdentity } from "./identity";
import { normalizeRawTender } from "./rawTender";
import { emptyEnrichment, StoreError } from "./store";
import { KeyedLock, settleInChunks } from "./tooling";
import type { AdvanceOutcome, StageDeps } from "./enrichment/stateMachine";
import type { Reconciled } from "./changeDetector";
import type { IdentityRule } from "./identity";
import type { ChangeOutcome, RunStatus, ScrapeRun, ScrapeRunCounts, Tender } from "./types";

const MAX_ERROR_DETAILS = 20;

export type OrchestratorDeps = StageDeps & {
  /** Shared between orchestrators that may touch the same tenders. */
  lock?: KeyedLock;
};

export type RunOptions = {
  /** The batch is the platform's complete listing; absent tenders start a missing streak. */
  fullScrape?: boolean;
  signal?: AbortSignal;
};

export type SweepSummary = {
  processed: number;
  completed: number;
  failed: number;
  downloaded: number;
  errors: string[];
};

type ItemResult =
  | { kind: "skipped" }
  | { kind: "done"; key: string; outcome: ChangeOutcome; enrichment: AdvanceOutcome | null };

const errText = (e: unknown) => (e instanceof Error ? e.message : String(e));

class RunTally {
  counts: ScrapeRunCounts = { found: 0, new: 0, updated: 0, closed: 0, errors: 0 };
  attachmentsDownloaded = 0;
  enrichmentCompleted = 0;
  enrichmentFailed = 0;
  errorDetails: string[] = [];

  error(detail: string) {
    this.counts.errors += 1;
    if (this.errorDetails.length < MAX_ERROR_DETAILS) this.errorDetails.push(detail);
  }

  enrichment(o: AdvanceOutcome) {
    this.attachmentsDownloaded += o.downloaded;
    if (o.completed) this.enrichmentCompleted += 1;
    if (o.tender.stage === "Failed") this.enrichmentFailed += 1;
  }
}

/**
 * One reconciliation and enrichment pass over a platform's scraped batch.
 * Item failures are counted and logged; only a StoreError ends the run early.
 */
export class RunOrchestrator {
  private readonly lock: KeyedLock;
  private readonly machine: EnrichmentStateMachine;
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.lock = deps.lock ?? new KeyedLock();
    this.machine = new EnrichmentStateMachine(deps);
    this.now = deps.now ?? (() => new Date());
  }

  async run(
    platform: string,
    batch: readonly unknown[],
    opts: RunOptions = {}
  ): Promise<ScrapeRun> {
    const { store, config } = this.deps;
    const started = this.now();
    const tally = new RunTally();
    tally.counts.found = batch.length;
    const rule = identityRuleFor(config, platform);
    const seen = new Set<string>();
    const aborted = () => opts.signal?.aborted ?? false;

    logger.info("scrape run started", {
      platform,
      found: batch.length,
      fullScrape: opts.fullScrape ?? false,
    });

    try {
      const results = await settleInChunks(
        batch,
        config.tenderConcurrency,
        (raw, index) => this.ingest(platform, raw, index, rule, started, seen, opts.signal),
        aborted
      );

      results.forEach((r, index) => {
        if (r.status === "rejected") {
          if (r.reason instanceof StoreError) throw r.reason;
          tally.error(`item ${index}: ${errText(r.reason)}`);
          logger.error("tender failed", { platform, index, error: errText(r.reason) });
          return;
        }
        if (r.value.kind === "skipped") return;
        if (r.value.outcome === "New") tally.counts.new += 1;
        if (r.value.outcome === "Updated") tally.counts.updated += 1;
        if (r.value.enrichment) tally.enrichment(r.value.enrichment);
      });

      if (!aborted() && opts.fullScrape) {
        tally.counts.closed += await this.closeMissing(platform, seen, started);
      }
      if (!aborted() && config.closeExpired) {
        tally.counts.closed += await this.closeExpired(platform, started);
      }
      if (!aborted() && config.sweepLimit > 0) {
        const sweep = await this.processPending(platform, {
          limit: config.sweepLimit,
          skip: seen,
          signal: opts.signal,
        });
        tally.attachmentsDownloaded += sweep.downloaded;
        tally.enrichmentCompleted += sweep.completed;
        tally.enrichmentFailed += sweep.failed;
        for (const e of sweep.errors) tally.error(e);
      }
    } catch (e) {
      if (e instanceof StoreError) {
        await this.saveFailedRun(platform, started, tally, e);
      }
      throw e;
    }

    const status: RunStatus = aborted()
      ? "Aborted"
      : tally.counts.errors > 0
        ? "Partial"
        : "Success";
    const run = await store.saveScrapeRun(this.summary(platform, started, tally, status));
    logger.info("scrape run finished", {
      platform,
      status,
      ...run.counts,
      attachmentsDownloaded: run.attachmentsDownloaded,
      enrichmentCompleted: run.enrichmentCompleted,
      enrichmentFailed: run.enrichmentFailed,
      elapsedMs: run.elapsedMs,
    });
    return run;
  }

  /**
   * Advances tenders of `platform` left mid-pipeline or waiting for a retry,
   * oldest first.
   */
  async processPending(
    platform: string,
    opts: { limit: number; skip?: ReadonlySet<string>; signal?: AbortSignal }
  ): Promise<SweepSummary> {
    const { config, store } = this.deps;
    const summary: SweepSummary = {
      processed: 0,
      completed: 0,
      failed: 0,
      downloaded: 0,
      errors: [],
    };
    const eligible = (await store.listTenders(platform))
      .filter((t) => !opts.skip?.has(t.identityKey) && this.needsWork(t))
      .sort((a, b) => a.lastChangedAt.localeCompare(b.lastChangedAt))
      .slice(0, opts.limit);

    const results = await settleInChunks(
      eligible,
      config.tenderConcurrency,
      (t) =>
        this.lock.run(t.identityKey, async () => {
          const current = await store.getTender(platform, t.identityKey);
          if (!current || !this.needsWork(current)) return null;
          return this.machine.advance(current, opts.signal);
        }),
      () => opts.signal?.aborted ?? false
    );

    results.forEach((r, i) => {
      if (r.status === "rejected") {
        if (r.reason instanceof StoreError) throw r.reason;
        const key = eligible[i].identityKey;
        summary.errors.push(`${key}: ${errText(r.reason)}`);
        logger.error("pending enrichment failed", {
          platform,
          identityKey: key,
          error: errText(r.reason),
        });
        return;
      }
      if (!r.value) return;
      summary.processed += 1;
      summary.downloaded += r.value.downloaded;
      if (r.value.completed) summary.completed += 1;
      if (r.value.tender.stage === "Failed") summary.failed += 1;
    });
    return summary;
  }

  private needsWork(t: Tender) {
    if (t.lifecycleStatus === "Closed" || t.stage === "Complete") return false;
    const { maxRetries, retryBackoffMs } = this.deps.config;
    return (
      t.stage !== "Failed" ||
      (canRetry(t, maxRetries) && isRetryDue(t, retryBackoffMs, this.now()))
    );
  }

  private async ingest(
    platform: string,
    raw: unknown,
    index: number,
    rule: IdentityRule,
    started: Date,
    seen: Set<string>,
    signal?: AbortSignal
  ): Promise<ItemResult> {
    if (signal?.aborted) return { kind: "skipped" };
    const { store, config } = this.deps;

    const normalized = normalizeRawTender(raw);
    const { key } = resolveIdentity(platform, normalized, rule);
    seen.add(key);
    if (normalized.warnings.length) {
      logger.warn("tender fields dropped", {
        platform,
        index,
        identityKey: key,
        warnings: normalized.warnings,
      });
    }

    return this.lock.run(key, async () => {
      const seenAt = this.now().toISOString();
      const box: { rec: Reconciled | null } = { rec: null };
      const tender = await store.updateTender(platform, key, (cur) => {
        box.rec = reconcile(
          {
            platform,
            identityKey: key,
            url: normalized.url,
            fields: normalized.fields,
            extras: normalized.extras,
            seenAt,
          },
          cur,
          started
        );
        return box.rec.tender;
      });
      const rec = box.rec;
      if (!tender || !rec) throw new Error(`tender ${key} was not written`);

      if (rec.reopened) {
        await store.clearAttachments(platform, key);
        await rm(downloadDir(config, tender), { recursive: true, force: true });
        await store.putEnrichment(emptyEnrichment(tender));
        logger.info("closed tender seen again", { platform, identityKey: key });
      }
      if (rec.outcome === "Updated") {
        logger.info("tender updated", { platform, identityKey: key, changed: rec.changed });
      }
      if (tender.lifecycleStatus === "Closed") {
        return { kind: "done", key, outcome: rec.outcome, enrichment: null };
      }

      await registerAttachments(store, tender, normalized.attachments, config.keywords, seenAt);
      const enrichment =
        tender.stage === "Complete" ? null : await this.machine.advance(tender, signal);
      return { kind: "done", key, outcome: rec.outcome, enrichment };
    });
  }

  private async closeMissing(platform: string, seen: ReadonlySet<string>, started: Date) {
    if (!seen.size) {
      logger.warn("full scrape returned no tenders, missing sweep skipped", { platform });
      return 0;
    }
    const at = started.toISOString();
    const threshold = this.deps.config.missingStreakThreshold;
    let closed = 0;
    for (const t of await this.deps.store.listTenders(platform)) {
      if (seen.has(t.identityKey) || t.lifecycleStatus === "Closed") continue;
      await this.lock.run(t.identityKey, async () => {
        const box = { closed: false };
        await this.deps.store.updateTender(platform, t.identityKey, (cur) => {
          if (!cur || cur.lifecycleStatus === "Closed") return null;
          const r = markMissing(cur, threshold, at);
          box.closed = r.closed;
          return r.tender;
        });
        if (box.closed) {
          closed += 1;
          logger.info("tender closed after missing streak", {
            platform,
            identityKey: t.identityKey,
          });
        }
      });
    }
    return closed;
  }

  private async closeExpired(platform: string, started: Date) {
    const at = started.toISOString();
    let closed = 0;
    for (const t of await this.deps.store.listTenders(platform)) {
      if (t.lifecycleStatus === "Closed" || !isExpired(t, started)) continue;
      await this.lock.run(t.identityKey, async () => {
        const box = { closed: false };
        await this.deps.store.updateTender(platform, t.identityKey, (cur) => {
          box.closed = !!cur && cur.lifecycleStatus !== "Closed" && isExpired(cur, started);
          return cur && box.closed ? { ...cur, lifecycleStatus: "Closed", lastChangedAt: at } : null;
        });
        if (box.closed) closed += 1;
      });
    }
    if (closed) logger.info("expired tenders closed", { platform, closed });
    return closed;
  }

  private summary(
    platform: string,
    started: Date,
    tally: RunTally,
    status: RunStatus
  ): ScrapeRun {
    const ended = this.now();
    return {
      platform,
      startedAt: started.toISOString(),
      endedAt: ended.toISOString(),
      elapsedMs: ended.getTime() - started.getTime(),
      status,
      counts: tally.counts,
      attachmentsDownloaded: tally.attachmentsDownloaded,
      enrichmentCompleted: tally.enrichmentCompleted,
      enrichmentFailed: tally.enrichmentFailed,
      errorDetails: tally.errorDetails,
    };
  }

  private async saveFailedRun(
    platform: string,
    started: Date,
    tally: RunTally,
    cause: StoreError
  ) {
    logger.error("scrape run aborted by store failure", { platform, error: cause.message });
    tally.errorDetails.push(cause.message);
    try {
      await this.deps.store.saveScrapeRun(this.summary(platform, started, tally, "Failed"));
    } catch (e) {
      logger.error("could not record failed run", { platform, error: errText(e) });
    }
  }
}
