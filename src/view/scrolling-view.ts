import { EMPTY_WINDOW, assertCapacity } from './types.js';
import type { RenderedWindow, View } from './types.js';

/**
 * Прокручиваемое окно: выбор может дойти до любого совпадения.
 *
 * Пока выбранная строка не упёрлась в верх окна, up() двигает её внутри окна.
 * Дальше растёт skip: курсор стоит на месте, а список едет под ним.
 * down() симметричен, skip не опускается ниже нуля.
 *
 * Между рендерами skip может выйти за конец списка; render() возвращает его
 * обратно так, чтобы окно было полным или доходило до конца списка.
 */
export class ScrollingView implements View {
  readonly capacity: number;
  private position = 0;
  private offset = 0;

  constructor(capacity: number) {
    assertCapacity(capacity);
    this.capacity = capacity;
  }

  get index(): number {
    return this.position;
  }

  get skip(): number {
    return this.offset;
  }

  up(): void {
    if (this.position + 1 < this.capacity) {
      this.position += 1;
    } else {
      this.offset += 1;
    }
  }

  down(): void {
    if (this.position > 0) {
      this.position -= 1;
    } else {
      this.offset = Math.max(0, this.offset - 1);
    }
  }

  render<E>(entries: readonly E[]): RenderedWindow<E> {
    if (entries.length === 0) {
      this.position = 0;
      this.offset = 0;
      return EMPTY_WINDOW;
    }

    if (this.offset + this.capacity > entries.length) {
      this.offset = Math.max(0, entries.length - this.capacity);
    }
    if (this.offset + this.position >= entries.length) {
      this.position = entries.length - this.offset - 1;
    }

    const visible = entries.slice(this.offset, this.offset + this.capacity);

    return {
      kind: 'non-empty',
      above: visible.slice(this.position + 1),
      selected: visible[this.position]!,
      below: visible.slice(0, this.position).reverse(),
    };
  }
}
