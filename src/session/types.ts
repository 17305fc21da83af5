// Типы сессии выбора.
import type { ScoredMatch } from '../items/types.js';
import type { RenderedWindow } from '../view/types.js';

// Логические события ввода. Разбор escape-последовательностей — забота адаптера.
export type KeyEvent =
  | { type: 'char'; text: string }
  | { type: 'backspace' }
  | { type: 'up' }
  | { type: 'down' }
  | { type: 'confirm' }
  | { type: 'cancel' };

export type SessionState = 'active' | 'confirmed' | 'cancelled';

// Отрисовщик окна. Геометрию терминала он определяет сам,
// сессии нужна только ёмкость окна.
export interface Renderer<T> {
  draw(window: RenderedWindow<ScoredMatch<T>>, query: string): void;
}
