import { z } from "zod";
import type { BackendContext, ResolverBackend } from "../resolution/types";
import { fetchJson, JsonRequest } from "../utils";

export type JsonFetcher = (url: string, request?: JsonRequest) => Promise<unknown>;

export interface WikipediaLookupOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs?: number;
  fetcher?: JsonFetcher;
}

const PageSummarySchema = z.object({
  type: z.string(),
  title: z.string().optional(),
  extract: z.string().optional()
});

const RETRY: JsonRequest["retry"] = {
  retries: 1,
  initialDelayMs: 300,
  factor: 2
};

export function buildSummaryUrl(baseUrl: string, title: string): string {
  const trimmedBase = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
  const pageTitle = encodeURIComponent(title.trim().replace(/ /g, "_"));
  return `${trimmedBase}/page/summary/${pageTitle}`;
}

/**
 * Reference lookup against the Wikipedia REST page summary endpoint. Unknown
 * titles (404) and disambiguation pages resolve to nothing.
 */
export class WikipediaLookupBackend implements ResolverBackend<string> {
  readonly strategy = "reference_lookup" as const;

  readonly timeoutMs?: number;

  private readonly fetcher: JsonFetcher;

  constructor(private readonly options: WikipediaLookupOptions) {
    this.timeoutMs = options.timeoutMs;
    this.fetcher = options.fetcher ?? fetchJson;
  }

  async resolve(task: string, { signal }: BackendContext): Promise<string | null> {
    const url = buildSummaryUrl(this.options.baseUrl, task);
    const data = await this.fetcher(url, {
      signal,
      headers: { "User-Agent": this.options.userAgent, Accept: "application/json" },
      validateStatus: (status) => status === 200 || status === 404,
      retry: RETRY
    });

    const parsed = PageSummarySchema.safeParse(data);
    if (!parsed.success || parsed.data.type !== "standard") {
      return null;
    }
    const extract = parsed.data.extract?.trim();
    return extract && extract.length > 0 ? extract : null;
  }
}
