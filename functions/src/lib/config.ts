import { z } from "zod";
import keywords from "../config/keywords.json";
import { DEFAULT_IDENTITY_RULE } from "./identity";
import type { IdentityRule } from "./identity";

const validRegex = (s: string) => {
  try {
    new RegExp(s);
    return true;
  } catch {
    return false;
  }
};

const wordList = z.array(z.string().min(1));

export const keywordsSchema = z.object({
  compilable: wordList,
  informative: wordList,
  sections: z.object({
    qualifications: wordList,
    evaluationCriteria: wordList,
    processDescription: wordList,
    deliveryTerms: wordList,
  }),
});

export type KeywordLists = z.infer<typeof keywordsSchema>;

const documentsSchema = z.object({
  downloadPath: z.string().default("data/downloads"),
  maxFileSizeMb: z.number().positive().default(50),
  allowedExtensions: z
    .array(z.string())
    .default(["pdf", "doc", "docx", "xls", "xlsx", "zip", "rar", "p7m", "txt"]),
  textExtensions: z.array(z.string()).default(["pdf", "txt"]),
  maxPdfPages: z.number().int().positive().default(20),
  minTextLength: z.number().int().min(0).default(50),
  maxSectionLength: z.number().int().positive().default(3000),
  maxRawTextLength: z.number().int().positive().default(50_000),
});

const timeoutsSchema = z.object({
  downloadMs: z.number().int().positive().default(60_000),
  extractionMs: z.number().int().positive().default(30_000),
  enrichmentMs: z.number().int().positive().default(90_000),
});

const llmSchema = z.object({
  provider: z.enum(["gemini", "openrouter"]).optional(),
  geminiModel: z.string().default("gemini-1.5-pro"),
  openrouterModel: z.string().default("openrouter/auto"),
  temperature: z.number().min(0).max(2).default(0.1),
  maxOutputTokens: z.number().int().positive().default(3000),
});

export const pipelineConfigSchema = z.object({
  /** Consecutive full passes a tender may be missing before it is Closed. */
  missingStreakThreshold: z.number().int().min(1).default(1),
  maxRetries: z.number().int().min(0).default(3),
  /** Wait before the first retry of a failed stage; doubles with every retry. */
  retryBackoffMs: z.number().int().min(0).default(300_000),
  closeExpired: z.boolean().default(true),
  tenderConcurrency: z.number().int().min(1).default(5),
  downloadConcurrency: z.number().int().min(1).default(4),
  /** Upper bound on leftover tenders advanced after a batch. */
  sweepLimit: z.number().int().min(0).default(50),
  documents: documentsSchema.default({}),
  timeouts: timeoutsSchema.default({}),
  platforms: z
    .record(
      z.string(),
      z.object({
        referencePattern: z.string().refine(validRegex, "invalid regular expression"),
      })
    )
    .default({
      ARIA: { referencePattern: "^(ARIA_\\d{4}_\\d+(_[A-Z])?|[A-Z0-9]{10})$" },
    }),
  keywords: keywordsSchema.default(keywords),
  llm: llmSchema.default({}),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type DocumentsConfig = PipelineConfig["documents"];

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = pipelineConfigSchema.parse({});

/** Defaults with `overrides` laid over them, validated. */
export function resolvePipelineConfig(overrides: unknown = {}): PipelineConfig {
  return pipelineConfigSchema.parse(overrides ?? {});
}

export function identityRuleFor(
  config: PipelineConfig,
  platform: string
): IdentityRule {
  const entry =
    config.platforms[platform] ?? config.platforms[platform.toUpperCase()];
  if (!entry) return DEFAULT_IDENTITY_RULE;
  return { referencePattern: new RegExp(entry.referencePattern) };
}
