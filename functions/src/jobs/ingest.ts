import { onRequest } from "firebase-functions/v2/https";
import { z } from "zod";
import { parseJsonBody, sendError, setCors } from "../lib/http";
import { GOOGLE_GENAI_API_KEY, OPENROUTER_API_KEY } from "../lib/llm";
import { createOrchestrator } from "../lib/pipeline";

const ingestBody = z.object({
  platform: z.string().trim().min(1),
  tenders: z.array(z.unknown()),
  fullScrape: z.boolean().optional(),
});

/** One reconciliation + enrichment pass over a scraped batch. */
export const scrapeIngest = onRequest(
  {
    region: "europe-west1",
    cors: true,
    timeoutSeconds: 540,
    memory: "1GiB",
    secrets: [GOOGLE_GENAI_API_KEY, OPENROUTER_API_KEY],
  },
  async (req, res): Promise<void> => {
    setCors(res);
    if (req.method === "OPTIONS") {
      res.status(204).send("");
      return;
    }
    if (req.method !== "POST") {
      res.status(405).json({ error: "Method not allowed" });
      return;
    }

    try {
      const body = ingestBody.parse(parseJsonBody(req.body));
      const { orchestrator } = await createOrchestrator();
      const run = await orchestrator.run(body.platform, body.tenders, {
        fullScrape: body.fullScrape ?? false,
      });
      res.json({ run });
    } catch (e) {
      sendError(res, e, "Ingest failed");
    }
  }
);
