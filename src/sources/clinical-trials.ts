import { isRecord, toText } from "../agent/normalizer.js";
import { createTTLCache, sourceCacheKey } from "../cache/lru.js";
import { appConfig } from "../config.js";
import { CLINICAL_TRIALS_API_BASE, CLINICAL_TRIALS_STUDY_BASE, USER_AGENT } from "../constants.js";
import { fetchJson } from "../http.js";
import { logEvent } from "../telemetry.js";
import type { TrialRegistry, TrialSearchOptions, TrialStudy } from "../types.js";

const MAX_LOCATIONS = 5;

const cache = createTTLCache<string, TrialStudy[]>();

function moduleOf(protocol: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = protocol[name];
  return isRecord(value) ? value : {};
}

function formatLocations(contacts: Record<string, unknown>): string[] {
  const rows = Array.isArray(contacts.locations) ? contacts.locations : [];
  const out: string[] = [];
  for (const row of rows) {
    if (!isRecord(row)) continue;
    const city = toText(row.city);
    const state = toText(row.state);
    if (!city && !state) continue;
    out.push([city, state, toText(row.country)].filter(Boolean).join(", "));
    if (out.length >= MAX_LOCATIONS) break;
  }
  return out;
}

/** ClinicalTrials.gov v2 `/studies` payload → studies; rows without an NCT id are dropped. */
export function parseClinicalTrialsResponse(payload: unknown): TrialStudy[] {
  if (!isRecord(payload) || !Array.isArray(payload.studies)) return [];
  const studies: TrialStudy[] = [];
  for (const study of payload.studies) {
    if (!isRecord(study) || !isRecord(study.protocolSection)) continue;
    const protocol = study.protocolSection;
    const identification = moduleOf(protocol, "identificationModule");
    const nctId = toText(identification.nctId);
    if (!nctId) continue;

    studies.push({
      nctId,
      title: toText(identification.briefTitle) || toText(identification.officialTitle),
      status: toText(moduleOf(protocol, "statusModule").overallStatus),
      summary: toText(moduleOf(protocol, "descriptionModule").briefSummary),
      eligibility: toText(moduleOf(protocol, "eligibilityModule").eligibilityCriteria),
      locations: formatLocations(moduleOf(protocol, "contactsLocationsModule")),
      url: `${CLINICAL_TRIALS_STUDY_BASE}/${nctId}`,
    });
  }
  return studies;
}

export function buildStudiesUrl(condition: string, options: TrialSearchOptions): string {
  const params = new URLSearchParams({
    "query.cond": condition,
    pageSize: String(Math.max(1, Math.floor(options.maxResults))),
    format: "json",
  });
  if (options.recruitingOnly) {
    params.set("filter.overallStatus", "RECRUITING");
  }
  return `${CLINICAL_TRIALS_API_BASE}?${params.toString()}`;
}

/** Rejects on transport or HTTP failure; an empty registry answer is `[]`. */
export async function searchClinicalTrials(
  condition: string,
  options: TrialSearchOptions = {
    recruitingOnly: true,
    maxResults: appConfig.sources.clinicalTrialsMaxResults,
  },
): Promise<TrialStudy[]> {
  const term = condition.trim();
  if (!term) return [];

  const cacheKey = sourceCacheKey("clinicaltrials", term, options.recruitingOnly, options.maxResults);
  const cached = cache.get(cacheKey);
  if (cached) return cached;

  const payload = await fetchJson<unknown>(buildStudiesUrl(term, options), {
    headers: { "user-agent": USER_AGENT },
  });
  const studies = parseClinicalTrialsResponse(payload).slice(0, options.maxResults);
  logEvent("info", "clinical_trials.search", { condition: term, studies: studies.length });
  cache.set(cacheKey, studies);
  return studies;
}

export const clinicalTrialsRegistry: TrialRegistry = {
  search: searchClinicalTrials,
};
