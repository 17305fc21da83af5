// Модель элементов списка выбора.

// Элемент, доступный для выбора: отображаемая метка и пользовательские данные.
export interface Item<T> {
  readonly label: string;
  readonly payload: T;
}

// Элемент с оценкой совпадения и позициями совпавших символов метки.
export interface ScoredMatch<T> {
  readonly item: Item<T>;
  readonly score: number;
  // Строго возрастающие индексы символов в item.label.
  readonly positions: readonly number[];
}

// Создание элемента. Пустая метка допустима.
export function createItem<T>(label: string, payload: T): Item<T> {
  return Object.freeze({ label, payload });
}

// Оценённая копия элемента. Позиции не проверяются: за них отвечает scorer,
// а рендер окна отбрасывает некорректные индексы сам.
export function withScore<T>(
  item: Item<T>,
  score: number,
  positions: readonly number[],
): ScoredMatch<T> {
  return Object.freeze({
    item: createItem(item.label, item.payload),
    score,
    positions: Object.freeze([...positions]),
  });
}
