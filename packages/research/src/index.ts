export {
  TavilySearchProvider,
  SearchProviderError,
  TAVILY_SEARCH_URL,
  fetchPageText,
  htmlToText,
  rerankResults,
} from "./search-provider.js";
export type { TavilySearchOptions } from "./search-provider.js";
export {
  ResearchStage,
  buildResearchQueries,
  createEmptyResearch,
  MAX_QUERIES,
  MAX_SOURCES,
  RESULTS_PER_QUERY,
} from "./research-stage.js";
export type { ResearchStageOptions, ResearchResult } from "./research-stage.js";
