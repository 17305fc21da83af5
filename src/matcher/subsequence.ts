import type { CaseMode } from '../config/schema.js';
import type { Scorer, ScoreResult } from './types.js';

// Веса оценки.
const SCORE_MATCH = 16;
const BONUS_BOUNDARY = 8;
const BONUS_FIRST_CHAR = 8;
const BONUS_CAMEL = 7;
const BONUS_CONSECUTIVE = 8;
const PENALTY_GAP = 3;
const PENALTY_LEADING = 1;
const MAX_LEADING_PENALTY = 15;

// Символы, после которых начинается новое «слово».
const SEPARATOR = /[\s_\-/.:,;|()[\]]/;
const LOWER = /\p{Ll}/u;
const UPPER = /\p{Lu}/u;

// Бонус за совпадение на границе слова.
function boundaryBonus(chars: string[], pos: number): number {
  if (pos === 0) {
    return BONUS_BOUNDARY + BONUS_FIRST_CHAR;
  }
  const prev = chars[pos - 1]!;
  if (SEPARATOR.test(prev)) {
    return BONUS_BOUNDARY;
  }
  if (LOWER.test(prev) && UPPER.test(chars[pos]!)) {
    return BONUS_CAMEL;
  }
  return 0;
}

/**
 * Сопоставление по подпоследовательности: символы запроса должны встречаться
 * в метке в том же порядке.
 *
 * Прямой проход находит первое полное вхождение, обратный сужает его до
 * кратчайшего окна с тем же концом. Индексы считаются по символам
 * (Array.from), а не по UTF-16.
 */
export class SubsequenceScorer implements Scorer {
  private readonly caseMode: CaseMode;

  constructor(options: { caseMode?: CaseMode } = {}) {
    this.caseMode = options.caseMode ?? 'smart';
  }

  score(label: string, query: string): ScoreResult | undefined {
    const needle = Array.from(query);
    if (needle.length === 0) {
      return { score: 0, positions: [] };
    }

    const caseSensitive =
      this.caseMode === 'respect' ||
      (this.caseMode === 'smart' && query !== query.toLowerCase());
    const fold = caseSensitive
      ? (c: string) => c
      : (c: string) => c.toLowerCase();

    const chars = Array.from(label);
    const folded = chars.map(fold);
    const pattern = needle.map(fold);

    // Прямой проход: конец первого полного вхождения.
    let qi = 0;
    let end = -1;
    for (let i = 0; i < folded.length; i++) {
      if (folded[i] === pattern[qi]) {
        qi++;
        if (qi === pattern.length) {
          end = i;
          break;
        }
      }
    }
    if (end === -1) {
      return undefined;
    }

    // Обратный проход: самое позднее начало при том же конце.
    let start = end;
    qi = pattern.length - 1;
    for (let i = end; i >= 0; i--) {
      if (folded[i] === pattern[qi]) {
        qi--;
        if (qi < 0) {
          start = i;
          break;
        }
      }
    }

    const positions: number[] = [];
    qi = 0;
    for (let i = start; i <= end && qi < pattern.length; i++) {
      if (folded[i] === pattern[qi]) {
        positions.push(i);
        qi++;
      }
    }

    let score = 0;
    for (let k = 0; k < positions.length; k++) {
      const pos = positions[k]!;
      score += SCORE_MATCH + boundaryBonus(chars, pos);
      if (k > 0) {
        const gap = pos - positions[k - 1]! - 1;
        score += gap === 0 ? BONUS_CONSECUTIVE : -gap * PENALTY_GAP;
      }
    }
    score -= Math.min(start, MAX_LEADING_PENALTY) * PENALTY_LEADING;

    return { score, positions };
  }
}
