import type { ViewConfig } from '../config/schema.js';
import type { View } from './types.js';
import { FixedView } from './fixed-view.js';
import { ScrollingView } from './scrolling-view.js';

// Создание стратегии окна по конфигурации.
export function createView(config: ViewConfig): View {
  switch (config.strategy) {
  case 'scrolling':
    return new ScrollingView(config.lines);
  case 'fixed':
    return new FixedView(config.lines);
  default:
    throw new Error(`Unsupported view strategy: ${config.strategy as string}`);
  }
}
