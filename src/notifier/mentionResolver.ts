/**
 * Mention resolution: maps "@name" tokens found in notes to Slack user ids.
 *
 * Two interchangeable resolvers share one interface:
 *   - table: exact match on the normalised display name
 *   - fuzzy: fuzzball ratio >= 50, best score wins, ties keep the first entry
 */

import * as fuzz from 'fuzzball';
import type { MentionResolverKind, UnmatchedMentionStyle } from '../config/environment';
import type { DirectoryEntry } from '../types/library';

export interface MentionResolver {
  resolve(token: string): string | undefined;
}

export const FUZZY_MATCH_THRESHOLD = 50;

const MENTION_PATTERN = /@[\p{L}\p{N}_]+/gu;

/**
 * Lowercase and drop the leading "@" and all whitespace
 */
export function normalizeName(value: string): string {
  return value.replace(/^@/, '').replace(/\s+/g, '').toLowerCase();
}

export class TableMentionResolver implements MentionResolver {
  private readonly byName = new Map<string, string>();

  constructor(entries: DirectoryEntry[]) {
    for (const entry of entries) {
      const key = normalizeName(entry.displayName);
      if (key && !this.byName.has(key)) {
        this.byName.set(key, entry.destinationId);
      }
    }
  }

  resolve(token: string): string | undefined {
    return this.byName.get(normalizeName(token));
  }
}

export class FuzzyMentionResolver implements MentionResolver {
  private readonly candidates: { name: string; destinationId: string }[];

  constructor(entries: DirectoryEntry[], private readonly threshold = FUZZY_MATCH_THRESHOLD) {
    this.candidates = entries
      .map(entry => ({ name: normalizeName(entry.displayName), destinationId: entry.destinationId }))
      .filter(candidate => candidate.name.length > 0);
  }

  resolve(token: string): string | undefined {
    const name = normalizeName(token);
    if (!name) return undefined;

    let bestScore = 0;
    let bestMatch: string | undefined;
    for (const candidate of this.candidates) {
      const score = fuzz.ratio(name, candidate.name);
      if (score > bestScore && score >= this.threshold) {
        bestScore = score;
        bestMatch = candidate.destinationId;
      }
    }
    return bestMatch;
  }
}

export function createMentionResolver(kind: MentionResolverKind, entries: DirectoryEntry[]): MentionResolver {
  return kind === 'fuzzy' ? new FuzzyMentionResolver(entries) : new TableMentionResolver(entries);
}

/**
 * Replace every @word token (any script) with a Slack mention marker (<@ID>).
 * Unmatched tokens stay as written, or are lowercased in the legacy style.
 */
export function substituteMentions(
  text: string,
  resolver: MentionResolver,
  unmatched: UnmatchedMentionStyle = 'verbatim'
): string {
  return text.replace(MENTION_PATTERN, token => {
    const destinationId = resolver.resolve(token);
    if (destinationId) {
      return `<@${destinationId}>`;
    }
    return unmatched === 'lowercase' ? token.toLowerCase() : token;
  });
}
