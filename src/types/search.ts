export interface SearchHit {
  readonly title: string;
  readonly link: string;
  readonly snippet: string;
}

export interface SearchResponse {
  readonly engine: string;
  readonly results: readonly SearchHit[];
  readonly page: number;
}

/** JSON shape returned to HTTP and MCP callers. */
export interface SearchResponseBody {
  engine: string;
  result: Array<{ title: string; link: string; snippet: string }>;
  page: number;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function createSearchHit(title: string, link: string, snippet = ''): SearchHit {
  return Object.freeze({
    title: collapseWhitespace(title),
    link,
    snippet: collapseWhitespace(snippet),
  });
}

export function createSearchResponse(engine: string, results: readonly SearchHit[], page: number): SearchResponse {
  return Object.freeze({
    engine,
    results: Object.freeze([...results]),
    page,
  });
}

export function toResponseBody(response: SearchResponse): SearchResponseBody {
  return {
    engine: response.engine,
    result: response.results.map((hit) => ({ title: hit.title, link: hit.link, snippet: hit.snippet })),
    page: response.page,
  };
}
