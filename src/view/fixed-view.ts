import { EMPTY_WINDOW, assertCapacity } from './types.js';
import type { RenderedWindow, View } from './types.js';

// Фиксированное окно: доступны только первые capacity совпадений,
// окно всегда начинается с начала списка.
export class FixedView implements View {
  readonly capacity: number;
  private position = 0;

  constructor(capacity: number) {
    assertCapacity(capacity);
    this.capacity = capacity;
  }

  get index(): number {
    return this.position;
  }

  get skip(): number {
    return 0;
  }

  up(): void {
    if (this.position + 1 < this.capacity) {
      this.position += 1;
    }
  }

  down(): void {
    this.position = Math.max(0, this.position - 1);
  }

  render<E>(entries: readonly E[]): RenderedWindow<E> {
    if (entries.length === 0) {
      this.position = 0;
      return EMPTY_WINDOW;
    }

    // Список мог сократиться с прошлого рендера.
    if (this.position >= entries.length) {
      this.position = entries.length - 1;
    }

    return {
      kind: 'non-empty',
      above: entries.slice(this.position + 1, this.capacity),
      selected: entries[this.position]!,
      below: entries.slice(0, this.position).reverse(),
    };
  }
}
