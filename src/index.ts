// Публичный API библиотеки.
export { find } from './finder.js';
export type { FindOptions } from './finder.js';

export * from './items/index.js';
export * from './view/index.js';
export * from './matcher/index.js';
export * from './session/index.js';
export * from './terminal/index.js';
export * from './sources/index.js';
export * from './config/index.js';
