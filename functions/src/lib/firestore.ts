import * as admin from "firebase-admin";
import { getFirestore, FieldValue } from "firebase-admin/firestore";
import {
  attachmentSchema,
  enrichmentRecordSchema,
  scrapeRunSchema,
  tenderSchema,
} from "./schemas";
import {
  StoreError,
  emptyEnrichment,
  summarize,
  tenderDocId,
} from "./store";
import type { StoreStatistics, TenderStore } from "./store";
import type { Attachment, EnrichmentRecord, ScrapeRun, Tender } from "./types";

if (!admin.apps.length) {
  admin.initializeApp();
}
export const db = getFirestore();
db.settings({ ignoreUndefinedProperties: true });

export const serverTimestamp = () => FieldValue.serverTimestamp();

export const tendersCol = () => db.collection("tenders");
export const attachmentsCol = (docId: string) =>
  tendersCol().doc(docId).collection("attachments");
export const enrichmentsCol = () => db.collection("enrichments");
export const scrapeRunsCol = () => db.collection("scrape_runs");

async function guard<T>(op: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof StoreError) throw e;
    throw new StoreError(op, e);
  }
}

export class FirestoreTenderStore implements TenderStore {
  async getTender(platform: string, key: string) {
    return guard("getTender", async () => {
      const snap = await tendersCol().doc(tenderDocId(platform, key)).get();
      return snap.exists ? tenderSchema.parse(snap.data()) : null;
    });
  }

  async updateTender(
    platform: string,
    key: string,
    mutate: (current: Tender | null) => Tender | null
  ) {
    const id = tenderDocId(platform, key);
    return guard("updateTender", () =>
      db.runTransaction(async (tx) => {
        const ref = tendersCol().doc(id);
        const enrichmentRef = enrichmentsCol().doc(id);
        const [snap, enrichmentSnap] = await Promise.all([
          tx.get(ref),
          tx.get(enrichmentRef),
        ]);
        const current = snap.exists ? tenderSchema.parse(snap.data()) : null;
        const next = mutate(current);
        if (!next) return current;
        tx.set(ref, { ...next, updatedAt: serverTimestamp() });
        if (!enrichmentSnap.exists) tx.set(enrichmentRef, emptyEnrichment(next));
        return next;
      })
    );
  }

  async listTenders(platform: string) {
    return guard("listTenders", async () => {
      const snap = await tendersCol().where("platform", "==", platform).get();
      return snap.docs.map((d) => tenderSchema.parse(d.data()));
    });
  }

  async deleteTender(platform: string, key: string) {
    const id = tenderDocId(platform, key);
    await guard("deleteTender", async () => {
      await db.recursiveDelete(tendersCol().doc(id));
      await enrichmentsCol().doc(id).delete();
    });
  }

  async listAttachments(platform: string, key: string) {
    return guard("listAttachments", async () => {
      const snap = await attachmentsCol(tenderDocId(platform, key)).get();
      return snap.docs.map((d) => attachmentSchema.parse(d.data()));
    });
  }

  async putAttachment(platform: string, att: Attachment) {
    await guard("putAttachment", async () => {
      await attachmentsCol(tenderDocId(platform, att.tenderKey))
        .doc(att.id)
        .set(att);
    });
  }

  async clearAttachments(platform: string, key: string) {
    await guard("clearAttachments", async () => {
      await db.recursiveDelete(attachmentsCol(tenderDocId(platform, key)));
    });
  }

  async getEnrichment(platform: string, key: string) {
    return guard("getEnrichment", async () => {
      const snap = await enrichmentsCol().doc(tenderDocId(platform, key)).get();
      return snap.exists ? enrichmentRecordSchema.parse(snap.data()) : null;
    });
  }

  async putEnrichment(record: EnrichmentRecord) {
    await guard("putEnrichment", async () => {
      await enrichmentsCol()
        .doc(tenderDocId(record.platform, record.tenderKey))
        .set({ ...record, updatedAt: serverTimestamp() });
    });
  }

  async saveScrapeRun(run: ScrapeRun) {
    return guard("saveScrapeRun", async () => {
      const body: ScrapeRun = { ...run };
      delete body.id;
      const ref = await scrapeRunsCol().add({
        ...body,
        createdAt: serverTimestamp(),
      });
      return { ...body, id: ref.id };
    });
  }

  async listScrapeRuns(platform?: string, limit = 100) {
    return guard("listScrapeRuns", async () => {
      const base = scrapeRunsCol();
      const q = platform ? base.where("platform", "==", platform) : base;
      const snap = await q.orderBy("startedAt", "desc").limit(limit).get();
      return snap.docs.map((d) => scrapeRunSchema.parse({ ...d.data(), id: d.id }));
    });
  }

  async getStatistics(): Promise<StoreStatistics> {
    return guard("getStatistics", async () => {
      const [tenders, atts] = await Promise.all([
        tendersCol().get(),
        db.collectionGroup("attachments").get(),
      ]);
      return summarize(
        tenders.docs.map((d) => tenderSchema.parse(d.data())),
        atts.docs.map((d) => attachmentSchema.parse(d.data()))
      );
    });
  }
}
