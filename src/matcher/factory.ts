import type { MatcherConfig } from '../config/schema.js';
import type { Scorer } from './types.js';
import { SubsequenceScorer } from './subsequence.js';

// Создание scorer-а по конфигурации.
export function createScorer(config: MatcherConfig): Scorer {
  return new SubsequenceScorer({ caseMode: config.caseMode });
}
