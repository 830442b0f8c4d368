import superagent from "superagent";
import { isRecord, toText } from "../agent/normalizer.js";
import { createTTLCache, sourceCacheKey } from "../cache/lru.js";
import { appConfig } from "../config.js";
import { PUBMED_API_BASE, PUBMED_ARTICLE_BASE, USER_AGENT } from "../constants.js";
import { logEvent, toErrorMessage } from "../telemetry.js";
import type { LiteratureArticle, LiteratureSource } from "../types.js";
import { McpClient } from "./mcp-client.js";

const cache = createTTLCache<string, LiteratureArticle[]>();
const mcp = appConfig.sources.pubmedMcpUrl ? new McpClient(appConfig.sources.pubmedMcpUrl) : null;

const XML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&apos;": "'",
  "&#39;": "'",
};

function cleanXmlText(value: string): string {
  return value
    .replace(/<[^>]*>/g, "")
    .replace(/&(?:amp|lt|gt|quot|apos|#39);/g, (entity) => XML_ENTITIES[entity] ?? entity)
    .replace(/\s+/g, " ")
    .trim();
}

function articleUrl(pmid: string): string {
  return `${PUBMED_ARTICLE_BASE}/${pmid}/`;
}

function parseAuthors(articleXml: string): string[] {
  const authors: string[] = [];
  for (const authorXml of articleXml.match(/<Author[\s>][\s\S]*?<\/Author>/g) ?? []) {
    const collective = authorXml.match(/<CollectiveName>([\s\S]*?)<\/CollectiveName>/);
    const lastName = authorXml.match(/<LastName>([\s\S]*?)<\/LastName>/);
    const foreName = authorXml.match(/<ForeName>([\s\S]*?)<\/ForeName>/);
    if (collective) {
      authors.push(cleanXmlText(collective[1]));
    } else if (lastName && foreName) {
      authors.push(`${cleanXmlText(foreName[1])} ${cleanXmlText(lastName[1])}`);
    } else if (lastName) {
      authors.push(cleanXmlText(lastName[1]));
    }
  }
  return authors;
}

/** `efetch` XML → articles; entries without a PMID are skipped. */
export function parsePubmedXml(xmlText: string): LiteratureArticle[] {
  const articles: LiteratureArticle[] = [];
  for (const articleXml of xmlText.match(/<PubmedArticle>[\s\S]*?<\/PubmedArticle>/g) ?? []) {
    const pmid = articleXml.match(/<PMID[^>]*>(\d+)<\/PMID>/)?.[1];
    if (!pmid) continue;

    const titleXml = articleXml.match(/<ArticleTitle[^>]*>([\s\S]*?)<\/ArticleTitle>/)?.[1];
    const abstractParts = [...articleXml.matchAll(/<AbstractText[^>]*>([\s\S]*?)<\/AbstractText>/g)]
      .map((match) => cleanXmlText(match[1]))
      .filter(Boolean);
    const pubDate = articleXml.match(/<PubDate>([\s\S]*?)<\/PubDate>/)?.[1] ?? articleXml;
    const year =
      pubDate.match(/<Year>(\d{4})<\/Year>/)?.[1] ??
      pubDate.match(/<MedlineDate>(\d{4})/)?.[1] ??
      "";

    articles.push({
      id: pmid,
      title: (titleXml ? cleanXmlText(titleXml) : "") || "No title available",
      abstract: abstractParts.join(" ") || "No abstract available",
      authors: parseAuthors(articleXml),
      year,
      url: articleUrl(pmid),
    });
  }
  return articles;
}

/** `search_articles` tool payload (`{ articles: [...] }`) → articles, capped at `limit`. */
export function parseMcpArticles(payload: unknown, limit: number): LiteratureArticle[] {
  if (!isRecord(payload) || !Array.isArray(payload.articles)) return [];
  const parsed: LiteratureArticle[] = [];
  for (const row of payload.articles) {
    if (!isRecord(row)) continue;
    const pmid = toText(row.pmid);
    const title = toText(row.title);
    if (!pmid || !title) continue;
    const authors = Array.isArray(row.authors)
      ? row.authors.map((author) => toText(author)).filter(Boolean)
      : [];
    parsed.push({
      id: pmid,
      title,
      abstract: toText(row.abstract) || "No abstract available",
      authors,
      year: toText(row.publicationDate ?? row.year).slice(0, 4),
      url: articleUrl(pmid),
    });
    if (parsed.length >= limit) break;
  }
  return parsed;
}

async function searchViaMcp(client: McpClient, query: string, limit: number) {
  const payload = await client.callTool(
    "search_articles",
    { query, max_results: limit, sort: "relevance" },
    10_000,
  );
  return parseMcpArticles(payload, limit);
}

function readIdList(body: unknown): string[] {
  if (!isRecord(body) || !isRecord(body.esearchresult)) return [];
  const ids = body.esearchresult.idlist;
  return Array.isArray(ids) ? ids.filter((id): id is string => typeof id === "string") : [];
}

async function searchViaEutils(query: string, limit: number): Promise<LiteratureArticle[]> {
  const apiKey = appConfig.sources.ncbiApiKey;
  const timeoutMs = appConfig.sources.httpTimeoutMs;

  const searchRes = await superagent
    .get(`${PUBMED_API_BASE}/esearch.fcgi`)
    .query({
      db: "pubmed",
      term: query,
      retmode: "json",
      retmax: limit,
      sort: "relevance",
      ...(apiKey ? { api_key: apiKey } : {}),
    })
    .set("User-Agent", USER_AGENT)
    .timeout(timeoutMs);

  const ids = readIdList(searchRes.body);
  if (ids.length === 0) return [];

  const fetchRes = await superagent
    .get(`${PUBMED_API_BASE}/efetch.fcgi`)
    .query({
      db: "pubmed",
      id: ids.join(","),
      retmode: "xml",
      ...(apiKey ? { api_key: apiKey } : {}),
    })
    .set("User-Agent", USER_AGENT)
    .buffer(true)
    .timeout(timeoutMs);

  return parsePubmedXml(fetchRes.text).slice(0, limit);
}

/**
 * Literature search: the MCP server when one is configured, NCBI E-utilities
 * otherwise or when it comes back empty. Never rejects.
 */
export async function searchPubmed(
  query: string,
  maxResults = appConfig.sources.pubmedMaxResults,
): Promise<LiteratureArticle[]> {
  const term = query.trim();
  const limit = Math.max(1, Math.floor(maxResults));
  if (!term) return [];

  const cacheKey = sourceCacheKey("pubmed", term, limit);
  const cached = cache.get(cacheKey);
  if (cached) return cached;

  if (mcp) {
    try {
      const viaMcp = await searchViaMcp(mcp, term, limit);
      if (viaMcp.length > 0) {
        cache.set(cacheKey, viaMcp);
        return viaMcp;
      }
    } catch (error) {
      logEvent("warn", "pubmed.mcp_failed", { query: term, message: toErrorMessage(error) });
    }
  }

  try {
    const articles = await searchViaEutils(term, limit);
    cache.set(cacheKey, articles);
    return articles;
  } catch (error) {
    logEvent("warn", "pubmed.search_failed", { query: term, message: toErrorMessage(error) });
    return [];
  }
}

export const pubmedSource: LiteratureSource = {
  search: searchPubmed,
};
