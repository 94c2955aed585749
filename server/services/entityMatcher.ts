/**
 * Resolves a normalised question to one club or city.
 *
 * Rules are applied in rank order and the first rule producing a candidate wins:
 *   1. exact     - the whole question is an alias
 *   2. override  - a pinned short form from OVERRIDE_RULES appears in the question
 *   3. contained - a whole alias appears in the question
 *   4. fragment  - a run of question words appears as whole words inside a
 *                  longer alias ("who coaches borussia")
 * Within a rule, ties go to the longest matched text, then clubs before
 * cities, then canonical name, then entity id.
 */

import type { Club, MatchedEntity } from "@shared/schema";
import { compareEntities, type AliasIndex } from "./aliasIndex";
import { buildAliasPattern } from "./textNormalizer";

export interface OverrideRule {
  trigger: string; // normalised word(s) looked for in the question
  target: string; // normalised word(s) the pinned club's name or alias contains
}

export const OVERRIDE_RULES: readonly OverrideRule[] = [
  { trigger: 'pauli', target: 'st pauli' },
  { trigger: 'gladbach', target: 'monchengladbach' },
];

// Shorter fragments would make "fc" match half the league.
const MIN_FRAGMENT_LENGTH = 3;

// Question words that never start or end a fragment.
const STOP_WORDS: ReadonlySet<string> = new Set([
  'a', 'about', 'and', 'at', 'club', 'coach', 'coached', 'coaches', 'coaching',
  'current', 'currently', 'for', 'head', 'in', 'is', 'it', 'manager', 'manages',
  'managing', 'me', 'of', 'tell', 'the', 'trainer', 'trains', 'what', 'whats',
  'who', 'whos',
]);

interface Candidate {
  matched: string;
  entity: MatchedEntity;
}

function compareCandidates(a: Candidate, b: Candidate): number {
  return b.matched.length - a.matched.length || compareEntities(a.entity, b.entity);
}

function pickBest(candidates: Candidate[]): MatchedEntity | null {
  if (candidates.length === 0) {
    return null;
  }
  return [...candidates].sort(compareCandidates)[0].entity;
}

function matchExact(query: string, index: AliasIndex): MatchedEntity | null {
  return pickBest(index.lookup(query).map(entity => ({ matched: query, entity })));
}

function matchOverride(query: string, index: AliasIndex, overrides: readonly OverrideRule[]): MatchedEntity | null {
  for (const rule of overrides) {
    if (!buildAliasPattern(rule.trigger).test(query)) {
      continue;
    }
    const target = buildAliasPattern(rule.target);
    const pinned = index.entries
      .filter(entry => entry.entity.kind === 'club' && target.test(entry.alias))
      .map(entry => ({ matched: rule.target, entity: entry.entity }));
    const entity = pickBest(pinned);
    if (entity) {
      return entity;
    }
  }
  return null;
}

function matchContained(query: string, index: AliasIndex): MatchedEntity | null {
  return pickBest(index.entries
    .filter(entry => entry.pattern.test(query))
    .map(entry => ({ matched: entry.alias, entity: entry.entity })));
}

/**
 * Runs of consecutive question words that neither start nor end with a stop
 * word. A trailing bare "s" is also tried without it ("bayerns" -> "bayern").
 */
export function questionFragments(query: string): string[] {
  const words = query.split(' ').filter(word => word.length > 0);
  const fragments = new Set<string>();
  for (let start = 0; start < words.length; start += 1) {
    if (STOP_WORDS.has(words[start])) {
      continue;
    }
    for (let end = start; end < words.length; end += 1) {
      const last = words[end];
      if (STOP_WORDS.has(last)) {
        continue;
      }
      const fragment = words.slice(start, end + 1).join(' ');
      fragments.add(fragment);
      if (last.length > MIN_FRAGMENT_LENGTH && last.endsWith('s')) {
        fragments.add(fragment.slice(0, -1));
      }
    }
  }
  return Array.from(fragments).filter(fragment => fragment.length >= MIN_FRAGMENT_LENGTH);
}

function matchFragment(query: string, index: AliasIndex): MatchedEntity | null {
  const fragments = questionFragments(query).map(fragment => ({ fragment, pattern: buildAliasPattern(fragment) }));
  const candidates: Candidate[] = [];
  for (const entry of index.entries) {
    for (const { fragment, pattern } of fragments) {
      if (pattern.test(entry.alias)) {
        candidates.push({ matched: fragment, entity: entry.entity });
      }
    }
  }
  return pickBest(candidates);
}

/**
 * Returns null when nothing in the index is named by the question.
 */
export function match(
  normalizedQuery: string,
  index: AliasIndex,
  overrides: readonly OverrideRule[] = OVERRIDE_RULES,
): MatchedEntity | null {
  const query = normalizedQuery.trim();
  if (!query) {
    return null;
  }
  return matchExact(query, index)
    ?? matchOverride(query, index, overrides)
    ?? matchContained(query, index)
    ?? matchFragment(query, index);
}

/**
 * The club whose coach answers the question. A city stands for the first of
 * its clubs in canonical order.
 */
export function resolveClub(entity: MatchedEntity): Club | null {
  if (entity.kind === 'club') {
    return entity.club;
  }
  return entity.clubs[0] ?? null;
}
