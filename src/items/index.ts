// Barrel-файл модуля элементов.
export type { Item, ScoredMatch } from './types.js';
export { createItem, withScore } from './types.js';
