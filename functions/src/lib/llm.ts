import { ChatOpenAI } from "@langchain/openai";
import { ChatGoogleGenerativeAI } from "@langchain/google-genai";
import type { LanguageModelLike } from "@langchain/core/language_models/base";
import { defineSecret } from "firebase-functions/params";
import { getRuntimeLLMCredentials } from "./runtimeConfig";
import type { PipelineConfig } from "./config";

export const GOOGLE_GENAI_API_KEY = defineSecret("GOOGLE_GENAI_API_KEY");
export const OPENROUTER_API_KEY = defineSecret("OPENROUTER_API_KEY");

type LLMSettings = PipelineConfig["llm"];

function gemini(apiKey: string, s: LLMSettings) {
  return new ChatGoogleGenerativeAI({
    model: s.geminiModel,
    apiKey,
    temperature: s.temperature,
    maxOutputTokens: s.maxOutputTokens,
  });
}

function openrouter(apiKey: string, s: LLMSettings) {
  return new ChatOpenAI({
    apiKey,
    configuration: {
      baseURL: "https://openrouter.ai/api/v1",
    },
    model: s.openrouterModel,
    temperature: s.temperature,
    maxTokens: s.maxOutputTokens,
  });
}

/** Returns a ready chat model. Always await this. */
export async function llmFactory(s: LLMSettings): Promise<LanguageModelLike> {
  const wantsOpenrouter = s.provider === "openrouter";

  if (!wantsOpenrouter && GOOGLE_GENAI_API_KEY.value()) {
    return gemini(GOOGLE_GENAI_API_KEY.value(), s);
  }
  if (OPENROUTER_API_KEY.value()) {
    return openrouter(OPENROUTER_API_KEY.value(), s);
  }

  // Fallback to Firestore runtime config (if no secrets set)
  const cfg = await getRuntimeLLMCredentials();
  const provider = s.provider ?? cfg.provider;

  if (provider !== "openrouter" && cfg.GOOGLE_GENAI_API_KEY) {
    return gemini(cfg.GOOGLE_GENAI_API_KEY, s);
  }
  if (cfg.OPENROUTER_API_KEY) {
    return openrouter(cfg.OPENROUTER_API_KEY, s);
  }

  throw new Error(
    "No LLM credentials found. Configure Firebase secrets or Firestore runtime config."
  );
}
