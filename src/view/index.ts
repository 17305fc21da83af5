// Barrel-файл модуля окна.
export type { RenderedWindow, View, WindowRow } from './types.js';
export {
  EMPTY_WINDOW,
  assertCapacity,
  selectedEntry,
  countAbove,
  windowLength,
  windowRows,
} from './types.js';
export { FixedView } from './fixed-view.js';
export { ScrollingView } from './scrolling-view.js';
export { createView } from './factory.js';
