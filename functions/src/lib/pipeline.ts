import { FirestoreTenderStore } from "./firestore";
import { llmFactory } from "./llm";
import { RunOrchestrator } from "./orchestrator";
import { getRuntimePipelineConfig } from "./runtimeConfig";
import { createDocumentReader } from "./enrichment/documentReader";
import { createLlmEnricher } from "./enrichment/enricher";
import { createKeywordAnalyzer } from "./enrichment/textAnalyzer";
import { KeyedLock } from "./tooling";

// one lock per function instance, shared by every request it serves
const lock = new KeyedLock();

/** Orchestrator over Firestore with the current runtime config. */
export async function createOrchestrator() {
  const config = await getRuntimePipelineConfig();
  const orchestrator = new RunOrchestrator({
    store: new FirestoreTenderStore(),
    config,
    analyzer: createKeywordAnalyzer(config.keywords.sections),
    reader: createDocumentReader(config.documents),
    enricher: createLlmEnricher(() => llmFactory(config.llm)),
    lock,
  });
  return { orchestrator, config };
}
