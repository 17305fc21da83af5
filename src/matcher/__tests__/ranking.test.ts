import { describe, it, expect } from 'vitest';
import { rankMatches } from '../ranking.js';
import { SubsequenceScorer } from '../subsequence.js';
import { createItem } from '../../items/types.js';
import type { Scorer } from '../types.js';

const LETTERS = ['A', 'B', 'C', 'D', 'E'].map((label) => createItem(label, label.toLowerCase()));

describe('rankMatches', () => {
  it('пустой запрос сохраняет исходный порядок', () => {
    const matches = rankMatches(LETTERS, '', new SubsequenceScorer());

    expect(matches.map((m) => m.item.label)).toEqual(['A', 'B', 'C', 'D', 'E']);
    expect(matches.every((m) => m.score === 0)).toBe(true);
  });

  it('исключает элементы без совпадения', () => {
    const items = ['Frodo', 'Sam', 'Pippin'].map((label) => createItem(label, label));

    const matches = rankMatches(items, 'p', new SubsequenceScorer());

    expect(matches.map((m) => m.item.label)).toEqual(['Pippin']);
    expect(matches[0]!.positions).toEqual([0]);
  });

  it('сортирует по убыванию оценки', () => {
    const items = ['xxab', 'a_b', 'ba'].map((label) => createItem(label, label));

    const matches = rankMatches(items, 'ab', new SubsequenceScorer());

    expect(matches.map((m) => [m.item.label, m.score])).toEqual([
      ['a_b', 53],
      ['xxab', 38],
    ]);
  });

  it('равные оценки сохраняют исходный порядок', () => {
    const scores: Record<string, number> = { A: 1, B: 5, C: 1, D: 5, E: 1 };
    const scorer: Scorer = {
      score: (label) => ({ score: scores[label] ?? 0, positions: [] }),
    };

    const matches = rankMatches(LETTERS, 'q', scorer);

    expect(matches.map((m) => m.item.label)).toEqual(['B', 'D', 'A', 'C', 'E']);
  });

  it('повторное ранжирование даёт тот же результат', () => {
    const items = ['gandalf', 'galadriel', 'gimli', 'legolas', 'aragorn']
      .map((label) => createItem(label, label));
    const scorer = new SubsequenceScorer();

    const first = rankMatches(items, 'gl', scorer);
    const second = rankMatches(items, 'gl', scorer);

    expect(second).toEqual(first);
  });

  it('не связывает совпадения с исходными элементами', () => {
    const matches = rankMatches(LETTERS, '', new SubsequenceScorer());

    expect(matches[0]!.item).toEqual(LETTERS[0]);
    expect(matches[0]!.item).not.toBe(LETTERS[0]);
  });

  it('пробрасывает ошибку scorer-а', () => {
    const scorer: Scorer = {
      score: () => {
        throw new Error('scorer failed');
      },
    };

    expect(() => rankMatches(LETTERS, 'a', scorer)).toThrow('scorer failed');
  });
});
