import { encyclopediaSummarySchema, type EncyclopediaSummary } from "@shared/schema";
import { HttpProviderAdapter } from "./httpProvider";
import type { SummaryFetch } from "./types";

export interface WikipediaProviderConfig {
  baseUrl: string; // language-specific host, e.g. https://en.wikipedia.org
  userAgent: string;
  timeoutMs: number;
}

export class WikipediaProvider extends HttpProviderAdapter implements SummaryFetch {
  constructor(config: WikipediaProviderConfig) {
    super('wikipedia', {
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      defaultHeaders: {
        'User-Agent': config.userAgent,
        Accept: 'application/json',
      },
    });
  }

  fetchSummary(title: string): Promise<EncyclopediaSummary> {
    const slug = encodeURIComponent(title.trim().replace(/ /g, '_'));
    return this.getJson(`/api/rest_v1/page/summary/${slug}`, encyclopediaSummarySchema);
  }
}
