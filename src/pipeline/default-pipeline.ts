import { OpenAiGenerativeService } from "../openai/client.js";
import { clinicalTrialsRegistry } from "../sources/clinical-trials.js";
import { pubmedSource } from "../sources/pubmed.js";
import { DiagnosticPipeline, type PipelineDeps } from "./orchestrator.js";

/** Pipeline wired to OpenAI, PubMed and ClinicalTrials.gov. */
export function createDefaultPipeline(overrides: Partial<PipelineDeps> = {}): DiagnosticPipeline {
  return new DiagnosticPipeline({
    generator: new OpenAiGenerativeService(),
    literature: pubmedSource,
    trials: clinicalTrialsRegistry,
    ...overrides,
  });
}
