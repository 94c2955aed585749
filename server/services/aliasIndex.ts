import type { City, Club, MatchedEntity } from "@shared/schema";
import { buildAliasPattern, normalize } from "./textNormalizer";

export interface AliasEntry {
  alias: string; // normalised
  pattern: RegExp;
  entity: MatchedEntity;
}

const KIND_RANK: Record<MatchedEntity['kind'], number> = {
  club: 0,
  city: 1,
};

export function entityName(entity: MatchedEntity): string {
  return entity.kind === 'club' ? entity.club.name : entity.city.name;
}

export function entityId(entity: MatchedEntity): string {
  return entity.kind === 'club' ? entity.club.id : entity.city.id;
}

/**
 * Stable order between entities: clubs before cities, then canonical name,
 * then entity id.
 */
export function compareEntities(a: MatchedEntity, b: MatchedEntity): number {
  return KIND_RANK[a.kind] - KIND_RANK[b.kind]
    || entityName(a).localeCompare(entityName(b), 'en')
    || entityId(a).localeCompare(entityId(b), 'en');
}

function compareClubs(a: Club, b: Club): number {
  return a.name.localeCompare(b.name, 'en') || a.id.localeCompare(b.id, 'en');
}

function normalizedAliases(name: string, aliases: readonly string[]): string[] {
  const unique = new Set<string>();
  for (const label of [name, ...aliases]) {
    const alias = normalize(label);
    if (alias.length > 0) {
      unique.add(alias);
    }
  }
  return Array.from(unique);
}

/**
 * Immutable lookup from normalised alias to the club or city it names.
 * Built once from reference data and passed explicitly to the matcher.
 */
export class AliasIndex {
  readonly clubs: readonly Club[];
  readonly cities: readonly City[];
  readonly entries: readonly AliasEntry[];
  private readonly byAlias: ReadonlyMap<string, readonly MatchedEntity[]>;

  private constructor(clubs: readonly Club[], cities: readonly City[], entries: readonly AliasEntry[]) {
    this.clubs = clubs;
    this.cities = cities;
    this.entries = entries;

    const byAlias = new Map<string, MatchedEntity[]>();
    for (const entry of entries) {
      const owners = byAlias.get(entry.alias) ?? [];
      owners.push(entry.entity);
      byAlias.set(entry.alias, owners);
    }
    this.byAlias = byAlias;
    Object.freeze(this);
  }

  /**
   * Build the index. Cities without a club in `clubs` are dropped, and
   * `clubIds` on each city is recomputed in canonical club order.
   */
  static build(clubs: readonly Club[], cities: readonly City[]): AliasIndex {
    const sortedClubs = [...clubs].sort(compareClubs).map(club => Object.freeze({
      ...club,
      aliases: Object.freeze([...club.aliases]),
    }));

    const cityEntities: MatchedEntity[] = [];
    for (const city of [...cities].sort((a, b) => a.name.localeCompare(b.name, 'en') || a.id.localeCompare(b.id, 'en'))) {
      const homeClubs = Object.freeze(sortedClubs.filter(club => club.cityId === city.id));
      if (homeClubs.length === 0) {
        continue;
      }
      const entity: MatchedEntity = {
        kind: 'city',
        city: Object.freeze({
          ...city,
          aliases: Object.freeze([...city.aliases]),
          clubIds: Object.freeze(homeClubs.map(club => club.id)),
        }),
        clubs: homeClubs,
      };
      cityEntities.push(Object.freeze(entity));
    }
    const clubEntities = sortedClubs.map(club => {
      const entity: MatchedEntity = { kind: 'club', club };
      return Object.freeze(entity);
    });

    const entries: AliasEntry[] = [];
    for (const entity of [...clubEntities, ...cityEntities]) {
      const { name, aliases } = entity.kind === 'club' ? entity.club : entity.city;
      for (const alias of normalizedAliases(name, aliases)) {
        entries.push(Object.freeze({ alias, pattern: buildAliasPattern(alias), entity }));
      }
    }

    entries.sort((a, b) => a.alias.localeCompare(b.alias, 'en') || compareEntities(a.entity, b.entity));
    const cityList = cityEntities.flatMap(entity => entity.kind === 'city' ? [entity.city] : []);
    return new AliasIndex(Object.freeze(sortedClubs), Object.freeze(cityList), Object.freeze(entries));
  }

  /** Entities owning exactly this normalised alias, in stable order. */
  lookup(alias: string): readonly MatchedEntity[] {
    return this.byAlias.get(alias) ?? [];
  }
}
