// Типы движка окна выбора.

// Видимая часть ранжированного списка.
// above и below упорядочены от ближайшего к выбранному элементу к дальнему.
export type RenderedWindow<E> =
  | { readonly kind: 'empty' }
  | {
      readonly kind: 'non-empty';
      readonly above: readonly E[];
      readonly selected: E;
      readonly below: readonly E[];
    };

// Строка окна в порядке отрисовки сверху вниз.
export interface WindowRow<E> {
  readonly entry: E;
  readonly selected: boolean;
}

// Стратегия окна. up() двигает выбор к концу списка (визуально вверх),
// down() — к началу. render() сам приводит состояние к границам переданного списка.
export interface View {
  readonly capacity: number;
  // Позиция выбранной строки внутри видимого окна.
  readonly index: number;
  // Сколько элементов скрыто перед окном.
  readonly skip: number;
  up(): void;
  down(): void;
  render<E>(entries: readonly E[]): RenderedWindow<E>;
}

export const EMPTY_WINDOW = Object.freeze({ kind: 'empty' as const });

// Проверка ёмкости окна при создании стратегии.
export function assertCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new Error(`View capacity must be a positive integer, got: ${capacity}`);
  }
}

export function selectedEntry<E>(window: RenderedWindow<E>): E | undefined {
  return window.kind === 'empty' ? undefined : window.selected;
}

// Количество элементов над выбранным.
export function countAbove<E>(window: RenderedWindow<E>): number {
  return window.kind === 'empty' ? 0 : window.above.length;
}

export function windowLength<E>(window: RenderedWindow<E>): number {
  return window.kind === 'empty'
    ? 0
    : window.above.length + 1 + window.below.length;
}

// Строки окна сверху вниз: дальние элементы above, выбранный, затем below.
export function windowRows<E>(window: RenderedWindow<E>): WindowRow<E>[] {
  if (window.kind === 'empty') {
    return [];
  }

  const rows: WindowRow<E>[] = [];
  for (let i = window.above.length - 1; i >= 0; i--) {
    rows.push({ entry: window.above[i]!, selected: false });
  }
  rows.push({ entry: window.selected, selected: true });
  for (const entry of window.below) {
    rows.push({ entry, selected: false });
  }
  return rows;
}
