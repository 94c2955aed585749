import type { City, Club } from "@shared/schema";
import { AliasIndex } from "./aliasIndex";
import { entityIdFromUri, type GraphQuery, type GraphRow } from "./providers";

export type ReferenceDataResult =
  | { status: 'ok'; index: AliasIndex }
  | { status: 'unavailable'; reason: string };

/**
 * All association football clubs (Q476028) playing in the Bundesliga (Q82595)
 * with their headquarters city in Germany, plus alternate labels of both.
 */
export function buildReferenceQuery(language: string): string {
  return `
SELECT DISTINCT ?club ?clubLabel ?altClubLabel ?city ?cityLabel ?altCityLabel WHERE {
  ?club wdt:P31 wd:Q476028;
        wdt:P118 wd:Q82595;
        wdt:P159 ?city.
  ?city wdt:P31/wdt:P279* wd:Q515.
  ?city wdt:P17 wd:Q183.

  ?club rdfs:label ?clubLabel.
  FILTER(LANG(?clubLabel) = "${language}")

  ?city rdfs:label ?cityLabel.
  FILTER(LANG(?cityLabel) = "${language}")

  OPTIONAL {
    ?club skos:altLabel ?altClubLabel.
    FILTER(LANG(?altClubLabel) = "${language}")
  }
  OPTIONAL {
    ?city skos:altLabel ?altCityLabel.
    FILTER(LANG(?altCityLabel) = "${language}")
  }
}`.trim();
}

interface PendingEntity {
  id: string;
  name: string;
  aliases: Set<string>;
}

/**
 * Fold SPARQL rows into clubs and cities. A club keeps the first home city
 * seen for it; rows naming a further city only contribute that city's labels.
 */
export function buildAliasIndex(rows: readonly GraphRow[]): AliasIndex {
  const clubs = new Map<string, PendingEntity & { cityId: string }>();
  const cities = new Map<string, PendingEntity>();

  for (const row of rows) {
    const clubId = entityIdFromUri(row.club);
    const cityId = entityIdFromUri(row.city);
    const clubLabel = row.clubLabel?.trim();
    const cityLabel = row.cityLabel?.trim();
    if (!clubId || !cityId || !clubLabel || !cityLabel) {
      continue;
    }

    let club = clubs.get(clubId);
    if (!club) {
      club = { id: clubId, name: clubLabel, aliases: new Set<string>(), cityId };
      clubs.set(clubId, club);
    }
    const altClubLabel = row.altClubLabel?.trim();
    if (altClubLabel) {
      club.aliases.add(altClubLabel);
    }

    let city = cities.get(cityId);
    if (!city) {
      city = { id: cityId, name: cityLabel, aliases: new Set<string>() };
      cities.set(cityId, city);
    }
    const altCityLabel = row.altCityLabel?.trim();
    if (altCityLabel) {
      city.aliases.add(altCityLabel);
    }
  }

  const clubList: Club[] = Array.from(clubs.values(), club => ({
    id: club.id,
    name: club.name,
    aliases: Array.from(club.aliases),
    cityId: club.cityId,
  }));
  const cityList: City[] = Array.from(cities.values(), city => ({
    id: city.id,
    name: city.name,
    aliases: Array.from(city.aliases),
    clubIds: [],
  }));
  return AliasIndex.build(clubList, cityList);
}

export class ReferenceDataService {
  constructor(
    private readonly graph: GraphQuery,
    private readonly language: string,
  ) {}

  async fetchReferenceData(): Promise<ReferenceDataResult> {
    try {
      const rows = await this.graph.runGraphQuery(buildReferenceQuery(this.language));
      const index = buildAliasIndex(rows);
      if (index.clubs.length === 0) {
        console.error(`[reference-data] Query returned ${rows.length} rows but no usable clubs`);
        return { status: 'unavailable', reason: 'the knowledge graph returned no Bundesliga clubs' };
      }
      return { status: 'ok', index };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('[reference-data] Wikidata request failed:', message);
      return { status: 'unavailable', reason: message };
    }
  }
}
