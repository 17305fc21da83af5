// Barrel-файл модуля сопоставления.
export type { Scorer, ScoreResult } from './types.js';
export { SubsequenceScorer } from './subsequence.js';
export { rankMatches } from './ranking.js';
export { createScorer } from './factory.js';
