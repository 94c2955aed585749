import { sparqlResultsSchema } from "@shared/schema";
import { HttpProviderAdapter } from "./httpProvider";
import type { GraphQuery, GraphRow } from "./types";

export interface WikidataProviderConfig {
  endpoint: string;
  userAgent: string;
  timeoutMs: number;
}

const ENTITY_ID = /^Q\d+$/;

export function isEntityId(value: string): boolean {
  return ENTITY_ID.test(value);
}

/**
 * Extract the Q-id from an entity URI such as http://www.wikidata.org/entity/Q15789.
 */
export function entityIdFromUri(uri: string | undefined): string | null {
  if (!uri) return null;
  const id = uri.slice(uri.lastIndexOf('/') + 1);
  return isEntityId(id) ? id : null;
}

export class WikidataProvider extends HttpProviderAdapter implements GraphQuery {
  constructor(config: WikidataProviderConfig) {
    super('wikidata', {
      baseUrl: config.endpoint,
      timeoutMs: config.timeoutMs,
      defaultHeaders: {
        'User-Agent': config.userAgent,
        Accept: 'application/sparql-results+json',
      },
    });
  }

  async runGraphQuery(queryText: string): Promise<GraphRow[]> {
    const data = await this.getJson('', sparqlResultsSchema, {
      query: { query: queryText, format: 'json' },
    });
    return data.results.bindings.map(binding => {
      const row: GraphRow = {};
      for (const [variable, term] of Object.entries(binding)) {
        row[variable] = term.value;
      }
      return row;
    });
  }
}
