import { Exa } from "exa-js";
import { z } from "zod";
import type { ToolDeclaration } from "./backend.js";
import { BackendUnavailable, RunCancelled } from "./errors.js";
import { raceAbort } from "./utils.js";

export type SearchHit = {
  title: string;
  url: string;
  snippet: string;
};

export interface SearchTool {
  readonly declaration: ToolDeclaration;
  search(query: string, signal: AbortSignal): Promise<SearchHit[]>;
}

export const WEB_SEARCH_TOOL_NAME = "web_search";

export const WebSearchArgsSchema = z.object({
  query: z.string().trim().min(2).max(300)
});

export const WEB_SEARCH_DECLARATION: ToolDeclaration = {
  name: WEB_SEARCH_TOOL_NAME,
  description:
    "Search the web for verified historical records about a place. Returns titles, URLs and text snippets.",
  parameters: {
    type: "object",
    properties: {
      query: { type: "string", description: "Search query, e.g. a place name plus a historical angle." }
    },
    required: ["query"],
    additionalProperties: false
  }
};

const SNIPPET_MAX_CHARS = 500;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function getStringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

export function toSearchHits(rawResults: unknown[]): SearchHit[] {
  const hits: SearchHit[] = [];
  for (const result of rawResults) {
    if (!isRecord(result)) continue;
    const url = getStringField(result, "url");
    const text = getStringField(result, "text");
    if (!url || !text) continue;
    const snippet = text.replace(/\s+/g, " ").slice(0, SNIPPET_MAX_CHARS);
    hits.push({ title: getStringField(result, "title") ?? url, url, snippet });
  }
  return hits;
}

/** Tool result text handed back to the backend. */
export function formatSearchHits(query: string, hits: SearchHit[]): string {
  if (hits.length === 0) return `No results for "${query}".`;
  return hits.map((hit, i) => `[${i + 1}] ${hit.title}\n${hit.url}\n${hit.snippet}`).join("\n\n");
}

export class ExaSearchTool implements SearchTool {
  readonly declaration = WEB_SEARCH_DECLARATION;
  private readonly exa: Exa;

  constructor(
    clientOrKey: Exa | string,
    private readonly numResults = 5
  ) {
    this.exa = typeof clientOrKey === "string" ? new Exa(clientOrKey) : clientOrKey;
  }

  async search(query: string, signal: AbortSignal): Promise<SearchHit[]> {
    try {
      const response = await raceAbort(
        this.exa.searchAndContents(query, { text: true, numResults: this.numResults }),
        signal
      );
      const rawResults: unknown[] = Array.isArray(response.results) ? response.results : [];
      return toSearchHits(rawResults);
    } catch (err) {
      if (err instanceof RunCancelled) throw err;
      const msg = err instanceof Error ? err.message : String(err);
      throw new BackendUnavailable(`Search failed for "${query}": ${msg}`, { cause: err });
    }
  }
}
