import { ARTICLES_TO_ANALYZE, QUERIES_TO_RUN } from "../constants.js";
import { logEvent } from "../telemetry.js";
import type {
  ConditionCandidate,
  LiteratureArticle,
  LiteratureSource,
  SymptomProfile,
} from "../types.js";
import { normalizeConditions, normalizeSearchQueries, rankByConfidence } from "./normalizer.js";
import { StageAgent, type StageAgentDeps } from "./stage-agent.js";

function buildQueryPrompt(profile: SymptomProfile): string {
  return `Based on these symptoms, write 3-5 targeted PubMed search queries that could surface rare diseases matching the presentation.

Symptoms: ${JSON.stringify(profile.primarySymptoms)}
Timeline: ${profile.timeline}
Severity: ${profile.severity}

Combine key symptoms, use precise medical terminology and favour rare or uncommon conditions.
Return a JSON array of strings: ["query1", "query2", "query3"]`;
}

function formatArticles(articles: LiteratureArticle[]): string {
  if (articles.length === 0) return "(no articles found)";
  return articles
    .map((article, index) => {
      const abstract = article.abstract.slice(0, 200);
      return `${index + 1}. ${article.title}\n   Abstract: ${abstract}...`;
    })
    .join("\n\n");
}

function buildAnalysisPrompt(profile: SymptomProfile, articles: LiteratureArticle[]): string {
  return `Analyze these research articles and identify rare diseases that match the patient's symptoms.

Patient symptoms: ${JSON.stringify(profile.primarySymptoms)}

Articles:
${formatArticles(articles)}

For each candidate condition give its name, the patient symptoms it explains,
a confidence score between 0.0 and 1.0, the key diagnostic tests and the supporting evidence.

Return a JSON array of objects with keys: name, matching_symptoms, confidence, diagnostic_tests, evidence.`;
}

/**
 * Queries → PubMed → model analysis. The result is ranked by confidence,
 * highest first, ties in the order the model listed them.
 */
export class LiteratureSearchAgent extends StageAgent<SymptomProfile, ConditionCandidate[]> {
  readonly name = "LiteratureSearch";
  readonly stage = "literature" as const;

  constructor(
    deps: StageAgentDeps,
    private readonly literature: LiteratureSource,
    private readonly resultsPerQuery = 10,
  ) {
    super(deps);
  }

  emptyValue(): ConditionCandidate[] {
    return [];
  }

  protected async execute(profile: SymptomProfile): Promise<ConditionCandidate[]> {
    const queryText = await this.callModel(buildQueryPrompt(profile), { label: "queries" });
    const queries = normalizeSearchQueries(queryText).slice(0, QUERIES_TO_RUN);

    const articles: LiteratureArticle[] = [];
    for (const query of queries) {
      const found = await this.literature.search(query, this.resultsPerQuery);
      articles.push(...found);
    }
    logEvent("info", "literature.articles", {
      queries: queries.length,
      articles: articles.length,
    });

    const analysis = await this.callModel(
      buildAnalysisPrompt(profile, articles.slice(0, ARTICLES_TO_ANALYZE)),
      { label: "analyze" },
    );
    return rankByConfidence(normalizeConditions(analysis));
  }
}
