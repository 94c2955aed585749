import type { EncyclopediaSummary } from "@shared/schema";

/** One SPARQL result row, variable name to plain string value. */
export type GraphRow = Partial<Record<string, string>>;

export interface GraphQuery {
  runGraphQuery(queryText: string): Promise<GraphRow[]>;
}

export interface SummaryFetch {
  fetchSummary(title: string): Promise<EncyclopediaSummary>;
}
