import { z } from "zod";

// Reference data (built once per session from the knowledge graph)
export interface Club {
  id: string; // Wikidata entity id, e.g. Q15789
  name: string;
  aliases: readonly string[];
  cityId: string;
}

export interface City {
  id: string;
  name: string;
  aliases: readonly string[];
  clubIds: readonly string[]; // sorted by club canonical name
}

export interface Coach {
  id: string;
  name: string;
  clubId: string;
  since?: string; // ISO start time of the head coach statement
  articleTitle?: string; // encyclopedia sitelink title in the configured language
}

export type MatchedEntity =
  | { kind: 'club'; club: Club }
  | { kind: 'city'; city: City; clubs: readonly Club[] };

export type ResponseStyle = 'prompt' | 'sentence';

export const responseStyleSchema = z.enum(['prompt', 'sentence']);

// Wikidata SPARQL endpoint (application/sparql-results+json)
export const sparqlTermSchema = z.object({
  type: z.string(),
  value: z.string(),
  'xml:lang': z.string().optional(),
  datatype: z.string().optional(),
});

export const sparqlResultsSchema = z.object({
  head: z.object({
    vars: z.array(z.string()),
  }).optional(),
  results: z.object({
    bindings: z.array(z.record(z.string(), sparqlTermSchema)),
  }),
});

// Wikipedia REST summary endpoint (/api/rest_v1/page/summary/{title})
export const encyclopediaSummarySchema = z.object({
  type: z.string(),
  title: z.string(),
  extract: z.string().optional().default(''),
});

export type EncyclopediaSummary = z.infer<typeof encyclopediaSummarySchema>;
