import { z } from "zod";
import { HumanMessage, SystemMessage } from "@langchain/core/messages";
import { StringOutputParser } from "@langchain/core/output_parsers";
import type { LanguageModelLike } from "@langchain/core/language_models/base";
import { TimeoutError } from "../tooling";
import type { EnrichedFields, MergedSections } from "../types";

export type EnricherInput = {
  sections: MergedSections;
  rawText: string | null;
};

/**
 * Turns prepared tender text into structured fields. Implementations reject
 * with an EnrichmentError.
 */
export interface Enricher {
  enrich(input: EnricherInput, signal?: AbortSignal): Promise<EnrichedFields>;
}

export class EnrichmentError extends Error {
  constructor(
    message: string,
    readonly recoverable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "EnrichmentError";
  }
}

export const NOT_FOUND = "Not Found";
const DEFAULT_CONFIDENCE = 0.7;

const textField = z
  .union([z.string(), z.array(z.string()), z.null()])
  .optional()
  .transform((v) => {
    const s = (Array.isArray(v) ? v.join("\n") : v ?? "").trim();
    return s || NOT_FOUND;
  });

const responseSchema = z
  .object({
    required_qualifications: textField,
    evaluation_criteria: textField,
    process_description: textField,
    delivery_methods: textField,
    required_documentation: textField,
    confidence_score: z.coerce
      .number()
      .finite()
      .default(DEFAULT_CONFIDENCE)
      .transform((n) => Math.min(1, Math.max(0, n))),
  })
  .passthrough();

const SYSTEM = [
  "You are an expert in Italian public procurement. Extract the requested fields in JSON.",
  "Return ONLY valid JSON with keys: required_qualifications, evaluation_criteria, process_description, delivery_methods, required_documentation, confidence_score (0.0-1.0). If a field is missing, set it to 'Not Found'.",
  "Focus on concrete values: scores, percentages, deadlines, ISO/SOA certifications, payment terms, submission modalities (platform/PEC), envelope structure (Busta A/B/C), guarantees and advances.",
  "Use concise Italian where appropriate. Do not invent data.",
].join("\n\n");

function block(label: string, text: string | null) {
  return text ? `<${label}>\n${text}\n</${label}>` : `<${label}>Not Provided</${label}>`;
}

export function buildPrompt(input: EnricherInput): string {
  const s = input.sections;
  return [
    block("qualifications", s.qualifications),
    block("evaluation", s.evaluationCriteria),
    block("process", s.processDescription),
    block("delivery", s.deliveryTerms),
    block("raw_text", input.rawText),
  ].join("\n\n");
}

export function isEmptyInput(input: EnricherInput) {
  return !input.rawText?.trim() && Object.values(input.sections).every((v) => !v?.trim());
}

function stripFences(text: string) {
  const t = text.trim();
  const m = t.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return m ? m[1] : t;
}

/** Model text → EnrichedFields. Throws EnrichmentError. */
export function parseEnrichmentResponse(text: string): EnrichedFields {
  let data: unknown;
  try {
    data = JSON.parse(stripFences(text));
  } catch (e) {
    throw new EnrichmentError("model response is not valid JSON", true, { cause: e });
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new EnrichmentError("model response is not a JSON object", false);
  }

  const parsed = responseSchema.safeParse(data);
  if (!parsed.success) {
    throw new EnrichmentError(
      `model response has invalid fields: ${parsed.error.issues
        .map((i) => i.path.join("."))
        .join(", ")}`,
      true
    );
  }
  const r = parsed.data;
  return {
    requiredQualifications: r.required_qualifications,
    evaluationCriteria: r.evaluation_criteria,
    processDescription: r.process_description,
    deliveryMethods: r.delivery_methods,
    requiredDocumentation: r.required_documentation,
    confidenceScore: r.confidence_score,
  };
}

const TRANSIENT =
  /\b429\b|quota|rate.?limit|resource.?exhausted|timed? ?out|timeout|econnreset|etimedout|enotfound|eai_again|fetch failed|network|unavailable|overloaded/i;

function statusOf(e: unknown): number | undefined {
  if (typeof e === "object" && e !== null && "status" in e && typeof e.status === "number") {
    return e.status;
  }
  return undefined;
}

/** Sorts a provider failure into retry-worthy or not. */
export function classifyEnricherError(e: unknown): EnrichmentError {
  if (e instanceof EnrichmentError) return e;
  const message = e instanceof Error ? e.message : String(e);
  if (e instanceof TimeoutError) return new EnrichmentError(message, true, { cause: e });

  const status = statusOf(e);
  const recoverable =
    status !== undefined ? status === 429 || status >= 500 : TRANSIENT.test(message);
  return new EnrichmentError(message, recoverable, { cause: e });
}

/**
 * Enricher backed by a LangChain chat model. The model is built on first use
 * so missing credentials surface as an enrichment failure.
 */
export function createLlmEnricher(getModel: () => Promise<LanguageModelLike>): Enricher {
  let model: LanguageModelLike | null = null;

  return {
    async enrich(input, signal) {
      if (isEmptyInput(input)) {
        throw new EnrichmentError("no text to enrich", false);
      }
      try {
        model ??= await getModel();
        const chain = model.pipe(new StringOutputParser());
        const text = await chain.invoke(
          [new SystemMessage(SYSTEM), new HumanMessage(buildPrompt(input))],
          { signal }
        );
        return parseEnrichmentResponse(text);
      } catch (e) {
        throw classifyEnricherError(e);
      }
    },
  };
}
