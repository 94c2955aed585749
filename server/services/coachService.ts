import type { Club, Coach } from "@shared/schema";
import { entityIdFromUri, isEntityId, type GraphQuery, type GraphRow } from "./providers";

// Letters, spaces, dots, apostrophes and hyphens; rejects ids like "Q123" and empty labels.
const PERSON_NAME = /^\p{L}[\p{L}\p{M} .'\u2019-]*\p{L}\.?$/u;

export function isPersonName(label: string): boolean {
  return PERSON_NAME.test(label);
}

/**
 * Current head coach (P286) statements of one club: no end time (P582),
 * not deprecated, labelled in `language`.
 */
export function buildCoachQuery(clubId: string, language: string): string {
  return `
SELECT DISTINCT ?coach ?coachLabel ?since ?article WHERE {
  wd:${clubId} p:P286 ?statement.
  ?statement ps:P286 ?coach.
  FILTER NOT EXISTS { ?statement pq:P582 ?endTime }
  FILTER NOT EXISTS { ?statement wikibase:rank wikibase:DeprecatedRank }
  OPTIONAL { ?statement pq:P580 ?since }

  ?coach rdfs:label ?coachLabel.
  FILTER(LANG(?coachLabel) = "${language}")
  FILTER(!REGEX(STR(?coachLabel), "^Q[0-9]+$"))

  OPTIONAL {
    ?article schema:about ?coach;
             schema:isPartOf <https://${language}.wikipedia.org/>.
  }
}`.trim();
}

export function articleTitleFromUrl(url: string | undefined): string | undefined {
  if (!url) return undefined;
  const slug = url.slice(url.lastIndexOf('/') + 1);
  if (!slug) return undefined;
  try {
    return decodeURIComponent(slug).replace(/_/g, ' ');
  } catch {
    return slug.replace(/_/g, ' ');
  }
}

function compareTimestampsDescending(a: string | undefined, b: string | undefined): number {
  const left = a ?? '';
  const right = b ?? '';
  if (left === right) return 0;
  return left > right ? -1 : 1;
}

// Most recent appointment first, then name, then id.
function compareCoaches(a: Coach, b: Coach): number {
  return compareTimestampsDescending(a.since, b.since)
    || a.name.localeCompare(b.name, 'en')
    || a.id.localeCompare(b.id, 'en');
}

/**
 * Collapse result rows into distinct coaches. A coach listed under several
 * statements keeps the latest start time.
 */
export function selectCoach(rows: readonly GraphRow[], club: Club): Coach | null {
  const coaches = new Map<string, Coach>();
  for (const row of rows) {
    const id = entityIdFromUri(row.coach);
    const name = row.coachLabel?.trim();
    if (!id || !name || !isPersonName(name)) {
      continue;
    }
    const candidate: Coach = {
      id,
      name,
      clubId: club.id,
      since: row.since || undefined,
      articleTitle: articleTitleFromUrl(row.article),
    };
    const existing = coaches.get(id);
    if (!existing || compareCoaches(candidate, existing) < 0) {
      coaches.set(id, candidate);
    }
  }

  const ranked = Array.from(coaches.values()).sort(compareCoaches);
  if (ranked.length > 1) {
    console.warn(`[coach] ${ranked.length} current head coaches listed for ${club.name}; using ${ranked[0].name}`);
  }
  return ranked[0] ?? null;
}

export class CoachService {
  constructor(
    private readonly graph: GraphQuery,
    private readonly language: string,
  ) {}

  async fetchCoach(club: Club): Promise<Coach | null> {
    if (!isEntityId(club.id)) {
      console.error(`[coach] Refusing to query malformed entity id "${club.id}" for ${club.name}`);
      return null;
    }

    try {
      const rows = await this.graph.runGraphQuery(buildCoachQuery(club.id, this.language));
      const coach = selectCoach(rows, club);
      if (!coach) {
        console.warn(`[coach] No current head coach found for ${club.name}`);
      }
      return coach;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[coach] Wikidata request failed for ${club.name}:`, message);
      return null;
    }
  }
}
