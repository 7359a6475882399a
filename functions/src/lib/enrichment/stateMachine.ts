import * as logger from "firebase-functions/logger";
import {
  canRetryDownload,
  downloadPendingAttachments,
  isTerminalDownload,
} from "../attachments/manager";
import { fileExtension } from "../attachments/fetcher";
import { emptyEnrichment } from "../store";
import { TimeoutError, withTimeout } from "../tooling";
import { classifyEnricherError, isEmptyInput } from "./enricher";
import { emptySections, mergeSections } from "./textAnalyzer";
import type { PipelineConfig } from "../config";
import type { TenderStore } from "../store";
import type {
  EnrichmentRecord,
  EnrichmentStage,
  FailableStage,
  Tender,
} from "../types";
import type { DocumentReader } from "./documentReader";
import type { Enricher } from "./enricher";
import type { AnalyzedDocument, TextAnalyzer } from "./textAnalyzer";

export type StageResult =
  | { ok: true; stage: EnrichmentStage; downloaded?: number }
  | { ok: false; stage: FailableStage; reason: string; recoverable: boolean };

export type StageDeps = {
  store: TenderStore;
  config: PipelineConfig;
  analyzer: TextAnalyzer;
  reader: DocumentReader;
  enricher: Enricher;
  fetchImpl?: typeof fetch;
  now?: () => Date;
};

export type AdvanceOutcome = {
  tender: Tender;
  steps: StageResult[];
  downloaded: number;
  /** Reached Complete during this call. */
  completed: boolean;
  /** Left in Failed with no automatic retry remaining. */
  exhausted: boolean;
};

/** Where a failed stage is entered from again on retry. */
export const RETRY_FROM: Record<FailableStage, EnrichmentStage> = {
  AttachmentsReady: "New",
  TextExtracted: "AttachmentsReady",
  AiEnriched: "TextExtracted",
};

const errText = (e: unknown) => (e instanceof Error ? e.message : String(e));

export function canRetry(t: Tender, maxRetries: number) {
  return (
    t.stage === "Failed" &&
    t.failure !== null &&
    t.failure.recoverable &&
    t.retryCount < maxRetries
  );
}

/** Whether the backoff window after the last failure has passed. */
export function isRetryDue(t: Tender, backoffMs: number, now: Date) {
  if (!t.failure) return false;
  const failedAt = Date.parse(t.failure.at);
  if (!Number.isFinite(failedAt)) return true;
  return failedAt + backoffMs * 2 ** t.retryCount <= now.getTime();
}

/**
 * Drives one tender through New → AttachmentsReady → TextExtracted →
 * AiEnriched → Complete. Each transition is committed with a compare-and-set
 * on the stage it started from; a failure stops the walk at Failed(stage).
 */
export class EnrichmentStateMachine {
  private readonly now: () => Date;

  constructor(private readonly deps: StageDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async advance(start: Tender, signal?: AbortSignal): Promise<AdvanceOutcome> {
    const out: AdvanceOutcome = {
      tender: start,
      steps: [],
      downloaded: 0,
      completed: false,
      exhausted: false,
    };

    let t = start;
    if (t.stage === "Failed") {
      if (!canRetry(t, this.deps.config.maxRetries)) {
        out.exhausted = true;
        return out;
      }
      if (!isRetryDue(t, this.deps.config.retryBackoffMs, this.now())) return out;
      const reopened = await this.reenter(t);
      if (!reopened) return out;
      t = reopened;
    }

    while (t.stage !== "Complete" && t.stage !== "Failed") {
      if (signal?.aborted) break;
      const from = t.stage;
      const result = await this.runStage(t);
      out.steps.push(result);
      if (result.ok && result.downloaded) out.downloaded += result.downloaded;

      const committed = await this.commit(t, from, result);
      if (!committed) break;
      t = committed;
      if (!result.ok) {
        logger.warn("enrichment stage failed", {
          platform: t.platform,
          identityKey: t.identityKey,
          stage: result.stage,
          reason: result.reason,
          recoverable: result.recoverable,
          retryCount: t.retryCount,
        });
        out.exhausted = !canRetry(t, this.deps.config.maxRetries);
        break;
      }
    }

    out.tender = t;
    out.completed = start.stage !== "Complete" && t.stage === "Complete";
    return out;
  }

  private async reenter(t: Tender): Promise<Tender | null> {
    const { store, config } = this.deps;
    const failure = t.failure;
    if (!failure) return null;
    const source = RETRY_FROM[failure.stage];

    const next = await store.updateTender(t.platform, t.identityKey, (cur) =>
      cur && canRetry(cur, config.maxRetries)
        ? { ...cur, stage: source, failure: null, retryCount: cur.retryCount + 1 }
        : null
    );
    if (!next || next.stage !== source) return null;

    if (failure.stage === "AttachmentsReady") {
      for (const a of await store.listAttachments(t.platform, t.identityKey)) {
        if (!canRetryDownload(a, config.maxRetries)) continue;
        await store.putAttachment(t.platform, {
          ...a,
          downloadStatus: "Pending",
          error: null,
          retryable: false,
          retryCount: a.retryCount + 1,
          updatedAt: this.now().toISOString(),
        });
      }
    }
    logger.info("retrying failed stage", {
      platform: t.platform,
      identityKey: t.identityKey,
      stage: failure.stage,
      retry: next.retryCount,
    });
    return next;
  }

  private async commit(
    t: Tender,
    from: EnrichmentStage,
    result: StageResult
  ): Promise<Tender | null> {
    const at = this.now().toISOString();
    const target: EnrichmentStage = result.ok ? result.stage : "Failed";
    const next = await this.deps.store.updateTender(t.platform, t.identityKey, (cur) => {
      if (!cur || cur.stage !== from) return null;
      if (result.ok) return { ...cur, stage: result.stage, failure: null, retryCount: 0 };
      return {
        ...cur,
        stage: "Failed",
        failure: {
          stage: result.stage,
          reason: result.reason,
          recoverable: result.recoverable,
          at,
        },
      };
    });
    // someone else moved the tender on
    if (!next || next.stage !== target) return null;
    return next;
  }

  private async runStage(t: Tender): Promise<StageResult> {
    switch (t.stage) {
      case "New":
        return this.collectAttachments(t);
      case "AttachmentsReady":
        return this.extractText(t);
      case "TextExtracted":
        return this.enrich(t);
      case "AiEnriched":
        return this.finish(t);
      default:
        throw new Error(`no transition out of ${t.stage}`);
    }
  }

  private async record(t: Tender): Promise<EnrichmentRecord> {
    return (await this.deps.store.getEnrichment(t.platform, t.identityKey)) ?? emptyEnrichment(t);
  }

  private async collectAttachments(t: Tender): Promise<StageResult> {
    const { config } = this.deps;
    const { attachments, downloaded } = await downloadPendingAttachments(
      this.deps.store,
      t,
      config,
      { fetchImpl: this.deps.fetchImpl, now: this.now }
    );
    if (!attachments.every(isTerminalDownload)) {
      return {
        ok: false,
        stage: "AttachmentsReady",
        reason: "attachments still pending",
        recoverable: true,
      };
    }
    const retryable = attachments.filter((a) => canRetryDownload(a, config.maxRetries));
    if (retryable.length && t.retryCount < config.maxRetries) {
      return {
        ok: false,
        stage: "AttachmentsReady",
        reason: retryable.map((a) => `${a.fileName}: ${a.error ?? "download failed"}`).join("; "),
        recoverable: true,
      };
    }
    return { ok: true, stage: "AttachmentsReady", downloaded };
  }

  private async extractText(t: Tender): Promise<StageResult> {
    const { store, config, reader, analyzer } = this.deps;
    const textExt = config.documents.textExtensions.map((e) => e.toLowerCase());
    const candidates = (await store.listAttachments(t.platform, t.identityKey)).filter(
      (a) => {
        const ext = fileExtension(a.localPath ?? "");
        return a.downloadStatus === "Downloaded" && ext !== null && textExt.includes(ext);
      }
    );

    const docs: AnalyzedDocument[] = [];
    const errors: string[] = [];
    let timedOut = false;
    for (const a of candidates) {
      const path = a.localPath;
      if (!path) continue;
      try {
        const text = await withTimeout(`extract ${a.fileName}`, config.timeouts.extractionMs, () =>
          reader.read(path)
        );
        if (!text) continue;
        docs.push({ source: a.fileName, text, sections: await analyzer.analyze(text) });
      } catch (e) {
        if (e instanceof TimeoutError) timedOut = true;
        errors.push(`${a.fileName}: ${errText(e)}`);
        logger.warn("text extraction failed", {
          platform: t.platform,
          identityKey: t.identityKey,
          file: a.fileName,
          error: errText(e),
        });
      }
    }

    if (candidates.length > 0 && errors.length === candidates.length) {
      return {
        ok: false,
        stage: "TextExtracted",
        reason: errors.join("; "),
        recoverable: timedOut,
      };
    }

    const { sections, rawText } = mergeSections(docs, config.documents);
    const rec = await this.record(t);
    await store.putEnrichment({
      ...rec,
      sections,
      rawText,
      sourceDocuments: docs.map((d) => d.source),
      failureReason: null,
      extractedAt: this.now().toISOString(),
    });
    return { ok: true, stage: "TextExtracted" };
  }

  private async enrich(t: Tender): Promise<StageResult> {
    const { store, config, enricher } = this.deps;
    const rec = await this.record(t);
    if (rec.aiOutput) return { ok: true, stage: "AiEnriched" };

    const input = {
      sections: rec.sections ?? emptySections(),
      rawText: rec.rawText,
    };
    if (isEmptyInput(input)) {
      await store.putEnrichment({
        ...rec,
        aiSkippedReason: "no extracted text",
        failureReason: null,
      });
      return { ok: true, stage: "AiEnriched" };
    }

    try {
      const fields = await withTimeout("enrich", config.timeouts.enrichmentMs, (signal) =>
        enricher.enrich(input, signal)
      );
      await store.putEnrichment({
        ...rec,
        aiOutput: fields,
        aiSkippedReason: null,
        confidenceScore: fields.confidenceScore,
        failureReason: null,
        enrichedAt: this.now().toISOString(),
      });
      return { ok: true, stage: "AiEnriched" };
    } catch (e) {
      const err = classifyEnricherError(e);
      await store.putEnrichment({ ...rec, failureReason: err.message });
      return {
        ok: false,
        stage: "AiEnriched",
        reason: err.message,
        recoverable: err.recoverable,
      };
    }
  }

  private async finish(t: Tender): Promise<StageResult> {
    const rec = await this.record(t);
    if (rec.aiOutput || rec.aiSkippedReason) return { ok: true, stage: "Complete" };
    return {
      ok: false,
      stage: "AiEnriched",
      reason: "enrichment output missing",
      recoverable: true,
    };
  }
}
