import type { SearchProvider, SearchResult } from "@plansmith/schemas";

export const TAVILY_SEARCH_URL = "https://api.tavily.com/search";

const DEFAULT_SEARCH_TIMEOUT_MS = 30000;
const DEFAULT_FETCH_TIMEOUT_MS = 25000;
const DEFAULT_PAUSE_MS = 700;
const MAX_PAGE_TEXT = 15000;

export class SearchProviderError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = "SearchProviderError";
  }
}

export interface TavilySearchOptions {
  apiKey: string;
  endpoint?: string;
  searchTimeoutMs?: number;
  fetchTimeoutMs?: number;
  /** Pause between page fetches, to stay under publishers' rate limits. */
  pauseMs?: number;
  maxTextChars?: number;
  onFetchError?: (url: string, error: Error) => void | Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function fetchWithTimeout(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timer);
  }
}

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&nbsp;": " ",
};

/** Readable text of an HTML page: scripts, styles and tags removed, whitespace collapsed. */
export function htmlToText(html: string): string {
  return html
    .replace(/<(script|style|noscript)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, " ")
    .replace(/<!--[\s\S]*?-->/g, " ")
    .replace(/<[^>]+>/g, " ")
    .replace(/&(?:amp|lt|gt|quot|#39|nbsp);/g, (entity) => ENTITIES[entity] ?? entity)
    .replace(/\s+/g, " ")
    .trim();
}

export async function fetchPageText(
  url: string,
  timeoutMs = DEFAULT_FETCH_TIMEOUT_MS,
  maxChars = MAX_PAGE_TEXT
): Promise<string> {
  const response = await fetchWithTimeout(url, { headers: { "User-Agent": "Mozilla/5.0 (plansmith)" } }, timeoutMs);
  if (!response.ok) throw new Error(`HTTP ${response.status} fetching ${url}`);
  return htmlToText(await response.text()).slice(0, maxChars);
}

/** Highest search score first; ties go to the longer extracted text. */
export function rerankResults(results: SearchResult[], topK: number): SearchResult[] {
  return [...results]
    .sort((a, b) => b.score - a.score || b.extracted_text.length - a.extracted_text.length)
    .slice(0, topK);
}

interface TavilyHit {
  title: string;
  url: string;
  content: string;
  score: number;
}

function parseHits(data: unknown): TavilyHit[] {
  if (!isRecord(data) || !Array.isArray(data.results)) {
    throw new SearchProviderError("Search API returned an unexpected body");
  }
  const hits: TavilyHit[] = [];
  for (const r of data.results) {
    if (!isRecord(r) || typeof r.url !== "string" || !r.url) continue;
    hits.push({
      title: typeof r.title === "string" ? r.title : "",
      url: r.url,
      content: typeof r.content === "string" ? r.content : "",
      score: typeof r.score === "number" ? r.score : 0,
    });
  }
  return hits;
}

/**
 * Tavily search plus page extraction. Asks for twice the wanted results,
 * fetches each page, then keeps the best `count` after reranking.
 */
export class TavilySearchProvider implements SearchProvider {
  private apiKey: string;
  private endpoint: string;
  private searchTimeoutMs: number;
  private fetchTimeoutMs: number;
  private pauseMs: number;
  private maxTextChars: number;
  private onFetchError: TavilySearchOptions["onFetchError"];

  constructor(opts: TavilySearchOptions) {
    if (!opts.apiKey) throw new SearchProviderError("Tavily API key is required");
    this.apiKey = opts.apiKey;
    this.endpoint = opts.endpoint ?? TAVILY_SEARCH_URL;
    this.searchTimeoutMs = opts.searchTimeoutMs ?? DEFAULT_SEARCH_TIMEOUT_MS;
    this.fetchTimeoutMs = opts.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.pauseMs = opts.pauseMs ?? DEFAULT_PAUSE_MS;
    this.maxTextChars = opts.maxTextChars ?? MAX_PAGE_TEXT;
    this.onFetchError = opts.onFetchError;
  }

  async search(query: string, count: number): Promise<SearchResult[]> {
    const hits = await this.queryApi(query, count * 2);
    const enriched: SearchResult[] = [];
    for (const [i, hit] of hits.entries()) {
      if (i > 0 && this.pauseMs > 0) await sleep(this.pauseMs);
      let text = "";
      try {
        text = await fetchPageText(hit.url, this.fetchTimeoutMs, this.maxTextChars);
      } catch (err) {
        await this.onFetchError?.(hit.url, err instanceof Error ? err : new Error(String(err)));
      }
      enriched.push({ title: hit.title, url: hit.url, snippet: hit.content, extracted_text: text, score: hit.score });
    }
    return rerankResults(enriched, count);
  }

  private async queryApi(query: string, maxResults: number): Promise<TavilyHit[]> {
    let response: Response;
    try {
      response = await fetchWithTimeout(this.endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          api_key: this.apiKey,
          query,
          search_depth: "advanced",
          max_results: maxResults,
          include_answer: false,
          include_images: false,
          include_raw_content: false,
        }),
      }, this.searchTimeoutMs);
    } catch (err) {
      throw new SearchProviderError(`Search request failed: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!response.ok) {
      throw new SearchProviderError(`Search API returned HTTP ${response.status}`, response.status);
    }
    let data: unknown;
    try {
      data = await response.json();
    } catch {
      throw new SearchProviderError("Search API returned invalid JSON");
    }
    return parseHits(data);
  }
}
