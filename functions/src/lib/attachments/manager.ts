import * as logger from "firebase-functions/logger";
import { join } from "node:path";
import { hashUrl } from "../identity";
import { settleInChunks } from "../tooling";
import { classifyAttachment } from "./classifier";
import { fetchAttachment, sanitizeFileName } from "./fetcher";
import type { ClassifierKeywords } from "./classifier";
import type { PipelineConfig } from "../config";
import type { RawAttachment } from "../rawTender";
import type { TenderStore } from "../store";
import type { Attachment, DownloadStatus, Tender } from "../types";

const TERMINAL: ReadonlySet<DownloadStatus> = new Set([
  "Downloaded",
  "Failed",
  "SkippedTooLarge",
  "SkippedBadExtension",
]);

export const isTerminalDownload = (a: Attachment) => TERMINAL.has(a.downloadStatus);

/** Failed on a transient error with attempts left. */
export const canRetryDownload = (a: Attachment, maxRetries: number) =>
  a.downloadStatus === "Failed" && a.retryable && a.retryCount < maxRetries;

function linkName(url: string) {
  try {
    const last = new URL(url).pathname.split("/").filter(Boolean).pop();
    return last ? decodeURIComponent(last) : url;
  } catch {
    return url;
  }
}

/**
 * Records the attachments a scrape reported for `tender`. Links are
 * de-duplicated by normalized URL; ones already stored keep their state.
 */
export async function registerAttachments(
  store: TenderStore,
  tender: Tender,
  raw: readonly RawAttachment[],
  keywords: ClassifierKeywords,
  now: string
): Promise<Attachment[]> {
  const existing = await store.listAttachments(tender.platform, tender.identityKey);
  const known = new Set(existing.map((a) => a.id));
  const added: Attachment[] = [];

  for (const r of raw) {
    const sourceUrl = r.url.trim();
    if (!sourceUrl) continue;
    const id = hashUrl(sourceUrl);
    if (known.has(id)) continue;
    known.add(id);

    const fileName = r.fileName?.trim() || linkName(sourceUrl);
    const { category, confidence } = classifyAttachment(fileName, keywords);
    const att: Attachment = {
      id,
      tenderKey: tender.identityKey,
      sourceUrl,
      fileName,
      category,
      classificationConfidence: confidence,
      downloadStatus: "Pending",
      localPath: null,
      sizeBytes: null,
      error: null,
      retryable: false,
      retryCount: 0,
      updatedAt: now,
    };
    await store.putAttachment(tender.platform, att);
    added.push(att);
  }

  if (added.length) {
    logger.debug("attachments registered", {
      platform: tender.platform,
      identityKey: tender.identityKey,
      added: added.length,
      duplicates: raw.length - added.length,
    });
  }
  return [...existing, ...added];
}

/** Per-tender download directory; each attachment gets a subdirectory named by its id. */
export function downloadDir(config: PipelineConfig, tender: Tender) {
  return join(
    config.documents.downloadPath,
    sanitizeFileName(tender.platform),
    sanitizeFileName(tender.identityKey)
  );
}

export type DownloadOptions = {
  fetchImpl?: typeof fetch;
  now?: () => Date;
};

/**
 * Fetches every Pending attachment of `tender`, a bounded number at a time,
 * and persists each outcome. Returns all attachments of the tender.
 */
export async function downloadPendingAttachments(
  store: TenderStore,
  tender: Tender,
  config: PipelineConfig,
  opts: DownloadOptions = {}
): Promise<{ attachments: Attachment[]; downloaded: number }> {
  const all = await store.listAttachments(tender.platform, tender.identityKey);
  const pending = all.filter((a) => a.downloadStatus === "Pending");
  const now = opts.now ?? (() => new Date());
  const dir = downloadDir(config, tender);
  const docs = config.documents;

  const results = await settleInChunks(pending, config.downloadConcurrency, async (att) => {
    const res = await fetchAttachment(att.sourceUrl, att.fileName, join(dir, att.id), {
      allowedExtensions: docs.allowedExtensions,
      maxBytes: Math.floor(docs.maxFileSizeMb * 1024 * 1024),
      timeoutMs: config.timeouts.downloadMs,
      fetchImpl: opts.fetchImpl,
    });
    const next: Attachment = {
      ...att,
      downloadStatus: res.status,
      localPath: res.status === "Downloaded" ? res.localPath : null,
      sizeBytes: res.sizeBytes,
      error: res.error,
      retryable: res.transient,
      updatedAt: now().toISOString(),
    };
    if (res.status !== "Downloaded") {
      logger.warn("attachment not downloaded", {
        platform: tender.platform,
        identityKey: tender.identityKey,
        url: att.sourceUrl,
        status: res.status,
        error: res.error,
      });
    }
    await store.putAttachment(tender.platform, next);
    return next;
  });

  const byId = new Map(all.map((a) => [a.id, a]));
  let downloaded = 0;
  for (const r of results) {
    if (r.status === "rejected") throw r.reason;
    byId.set(r.value.id, r.value);
    if (r.value.downloadStatus === "Downloaded") downloaded += 1;
  }
  return { attachments: [...byId.values()], downloaded };
}
