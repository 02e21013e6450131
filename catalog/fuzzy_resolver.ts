import * as fuzz from 'fuzzball';

import type { CatalogSource } from './catalog_store.js';

export const MIN_MATCH_SCORE = 70;

export type FuzzyMatch = {
  appid: number;
  name: string;
  score: number;
};

/**
 * Best token-set match of `query` among the names in `universe`. Ties keep
 * the earliest name; anything under `minScore` is not a match.
 */
export function findBestMatch(
  query: string,
  universe: ReadonlyMap<string, number>,
  minScore: number = MIN_MATCH_SCORE,
): FuzzyMatch | null {
  const trimmed = query.trim();
  if (!trimmed || universe.size === 0) {
    return null;
  }
  let best: FuzzyMatch | null = null;
  for (const [name, appid] of universe) {
    const score = fuzz.token_set_ratio(trimmed, name);
    if (!best || score > best.score) {
      best = { appid, name, score };
      if (score === 100) break;
    }
  }
  return best && best.score >= minScore ? best : null;
}

export class FuzzyResolver {
  constructor(
    private readonly catalog: CatalogSource,
    private readonly minScore: number = MIN_MATCH_SCORE,
  ) {}

  /**
   * Resolves against `universe` when given (for example only the caller's own
   * items); otherwise waits for the catalog's first sync and uses all of it.
   */
  async resolve(query: string, universe?: ReadonlyMap<string, number>): Promise<FuzzyMatch | null> {
    if (universe) {
      return findBestMatch(query, universe, this.minScore);
    }
    await this.catalog.whenReady();
    return findBestMatch(query, this.catalog.universe(), this.minScore);
  }
}
