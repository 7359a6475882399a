import { onRequest } from "firebase-functions/v2/https";
import { scrapeIngest } from "./jobs/ingest";
import { enrichmentProcess } from "./jobs/process";
import { FirestoreTenderStore } from "./lib/firestore";
import { sendError, setCors } from "./lib/http";
export { scrapeIngest, enrichmentProcess };

/* ---------------- Store statistics ---------------- */
export const pipelineStats = onRequest(
  { region: "europe-west1", cors: true, timeoutSeconds: 60, memory: "256MiB" },
  async (req, res): Promise<void> => {
    setCors(res);
    if (req.method === "OPTIONS") {
      res.status(204).send("");
      return;
    }

    try {
      const platform =
        typeof req.query.platform === "string" && req.query.platform.trim()
          ? req.query.platform.trim()
          : undefined;
      const limit = Math.min(Math.max(Number(req.query.limit ?? 10) || 10, 1), 100);

      const store = new FirestoreTenderStore();
      const [stats, runs] = await Promise.all([
        store.getStatistics(),
        store.listScrapeRuns(platform, limit),
      ]);
      res.json({ stats, runs });
    } catch (e) {
      sendError(res, e, "Stats failed");
    }
  }
);
