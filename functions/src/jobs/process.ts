import { onRequest } from "firebase-functions/v2/https";
import * as logger from "firebase-functions/logger";
import { z } from "zod";
import { parseJsonBody, sendError, setCors } from "../lib/http";
import { GOOGLE_GENAI_API_KEY, OPENROUTER_API_KEY } from "../lib/llm";
import { createOrchestrator } from "../lib/pipeline";

const processBody = z.object({
  platform: z.string().trim().min(1),
  limit: z.number().int().positive().max(500).optional(),
});

/** Enrichment-only pass over pending and retry-eligible tenders. */
export const enrichmentProcess = onRequest(
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
      const body = processBody.parse(parseJsonBody(req.body));
      const { orchestrator, config } = await createOrchestrator();
      const summary = await orchestrator.processPending(body.platform, {
        limit: body.limit ?? config.sweepLimit,
      });
      logger.info("enrichment pass finished", { platform: body.platform, ...summary });
      res.json(summary);
    } catch (e) {
      sendError(res, e, "Enrichment failed");
    }
  }
);
