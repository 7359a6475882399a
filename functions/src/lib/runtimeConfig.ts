import * as logger from "firebase-functions/logger";
import { z } from "zod";
import { db } from "./firestore";
import { DEFAULT_PIPELINE_CONFIG, resolvePipelineConfig } from "./config";
import type { PipelineConfig } from "./config";

const llmCredentialsSchema = z.object({
  provider: z.enum(["gemini", "openrouter"]).optional(),
  GOOGLE_GENAI_API_KEY: z.string().optional(),
  OPENROUTER_API_KEY: z.string().optional(),
});

export type LLMCredentials = z.infer<typeof llmCredentialsSchema>;

type Cached<T> = { at: number; data: T };

let pipelineCache: Cached<PipelineConfig> | null = null;
let llmCache: Cached<LLMCredentials> | null = null;
const TTL_MS = 60_000; // 1 minute cache

export async function getRuntimePipelineConfig(): Promise<PipelineConfig> {
  const now = Date.now();
  if (pipelineCache && now - pipelineCache.at < TTL_MS) return pipelineCache.data;

  const snap = await db.doc("config/runtime/pipeline/current").get();
  let data = DEFAULT_PIPELINE_CONFIG;
  if (snap.exists) {
    try {
      data = resolvePipelineConfig(snap.data());
    } catch (e) {
      logger.error("runtime pipeline config rejected, using defaults", {
        error: e instanceof Error ? e.message : String(e),
      });
    }
  }
  pipelineCache = { at: now, data };
  return data;
}

export async function getRuntimeLLMCredentials(): Promise<LLMCredentials> {
  const now = Date.now();
  if (llmCache && now - llmCache.at < TTL_MS) return llmCache.data;

  const snap = await db.doc("config/runtime/llm/current").get();
  const parsed = llmCredentialsSchema.safeParse(snap.exists ? snap.data() : {});
  const data = parsed.success ? parsed.data : {};
  llmCache = { at: now, data };
  return data;
}
