import { withScore } from '../items/types.js';
import type { Item, ScoredMatch } from '../items/types.js';
import type { Scorer } from './types.js';

// Полное ранжирование: каждый элемент заново оценивается под текущий запрос.
// Сортировка по убыванию оценки, равные оценки сохраняют исходный порядок
// (Array.prototype.sort стабилен).
export function rankMatches<T>(
  items: readonly Item<T>[],
  query: string,
  scorer: Scorer,
): ScoredMatch<T>[] {
  const matches: ScoredMatch<T>[] = [];

  for (const item of items) {
    const result = scorer.score(item.label, query);
    if (result) {
      matches.push(withScore(item, result.score, result.positions));
    }
  }

  matches.sort((a, b) => b.score - a.score);

  return matches;
}
