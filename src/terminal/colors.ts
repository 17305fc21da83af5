import chalk, { Chalk, supportsColor } from 'chalk';
import type { ChalkInstance } from 'chalk';
import type { ThemeConfig } from '../config/schema.js';

// Экземпляр chalk по настройке theme.color.
export function createChalk(color: ThemeConfig['color']): ChalkInstance {
  switch (color) {
  case 'never':
    return new Chalk({ level: 0 });
  case 'always':
    return new Chalk({ level: supportsColor && supportsColor.level > 0 ? supportsColor.level : 1 });
  case 'auto':
    return chalk;
  default:
    throw new Error(`Unsupported color mode: ${color as string}`);
  }
}
