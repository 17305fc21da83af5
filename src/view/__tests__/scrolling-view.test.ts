import { describe, it, expect } from 'vitest';
import { ScrollingView } from '../scrolling-view.js';
import { countAbove, selectedEntry, windowLength } from '../types.js';

const ITEMS = ['A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I', 'J', 'K', 'L', 'M'];
const FEW_ITEMS = ['A', 'B', 'C'];

// Повторяет действие n раз.
function repeat(n: number, action: () => void): void {
  for (let i = 0; i < n; i++) {
    action();
  }
}

describe('ScrollingView', () => {
  it('отклоняет нулевую ёмкость', () => {
    expect(() => new ScrollingView(0)).toThrow('View capacity must be a positive integer, got: 0');
  });

  it('отклоняет отрицательную и дробную ёмкость', () => {
    expect(() => new ScrollingView(-3)).toThrow();
    expect(() => new ScrollingView(2.5)).toThrow();
  });

  it('первый рендер выбирает первый элемент', () => {
    const view = new ScrollingView(8);

    const window = view.render(ITEMS);

    expect(windowLength(window)).toBe(8);
    expect(countAbove(window)).toBe(7);
    expect(selectedEntry(window)).toBe('A');
  });

  it('up() двигает выбор внутри окна', () => {
    const view = new ScrollingView(8);
    view.render(ITEMS);

    repeat(3, () => view.up());
    const window = view.render(ITEMS);

    expect(windowLength(window)).toBe(8);
    expect(countAbove(window)).toBe(4);
    expect(selectedEntry(window)).toBe('D');
    expect(window).toEqual({
      kind: 'non-empty',
      above: ['E', 'F', 'G', 'H'],
      selected: 'D',
      below: ['C', 'B', 'A'],
    });
  });

  it('up() за пределами окна прокручивает список и упирается в конец', () => {
    const view = new ScrollingView(8);
    view.render(ITEMS);

    repeat(13, () => view.up());
    const window = view.render(ITEMS);

    expect(view.index).toBe(7);
    expect(view.skip).toBe(5);
    expect(windowLength(window)).toBe(8);
    expect(countAbove(window)).toBe(0);
    expect(window).toEqual({
      kind: 'non-empty',
      above: [],
      selected: 'M',
      below: ['L', 'K', 'J', 'I', 'H', 'G', 'F'],
    });
  });

  it('прокрутка держит курсор в верхней строке окна', () => {
    const view = new ScrollingView(8);

    repeat(10, () => view.up());
    const window = view.render(ITEMS);

    expect(view.index).toBe(7);
    expect(view.skip).toBe(3);
    expect(selectedEntry(window)).toBe('K');
    expect(countAbove(window)).toBe(0);
  });

  it('down() на первом элементе ничего не делает', () => {
    const view = new ScrollingView(8);
    view.render(ITEMS);

    view.down();
    const window = view.render(ITEMS);

    expect(windowLength(window)).toBe(8);
    expect(countAbove(window)).toBe(7);
    expect(view.index).toBe(0);
    expect(view.skip).toBe(0);
  });

  it('down() возвращает выбор обратно', () => {
    const view = new ScrollingView(8);
    view.render(ITEMS);

    repeat(3, () => view.up());
    view.down();
    const window = view.render(ITEMS);

    expect(windowLength(window)).toBe(8);
    expect(countAbove(window)).toBe(5);
  });

  it('down() после прокрутки сначала двигает курсор, затем уменьшает skip', () => {
    const view = new ScrollingView(3);
    const items = ['A', 'B', 'C', 'D', 'E'];

    repeat(4, () => view.up());
    view.render(items);
    expect(view.index).toBe(2);
    expect(view.skip).toBe(2);

    repeat(2, () => view.down());
    expect(view.index).toBe(0);
    expect(view.skip).toBe(2);

    view.down();
    const window = view.render(items);

    expect(view.skip).toBe(1);
    expect(window).toEqual({
      kind: 'non-empty',
      above: ['C', 'D'],
      selected: 'B',
      below: [],
    });
  });

  it('короткий список показывает только имеющиеся элементы', () => {
    const view = new ScrollingView(8);
    view.render(FEW_ITEMS);

    repeat(4, () => view.up());
    const window = view.render(FEW_ITEMS);

    expect(windowLength(window)).toBe(3);
    expect(countAbove(window)).toBe(0);
    expect(selectedEntry(window)).toBe('C');
  });

  it('короткий список выдерживает любое число down()', () => {
    const view = new ScrollingView(8);

    repeat(20, () => view.down());
    const window = view.render(FEW_ITEMS);

    expect(windowLength(window)).toBe(3);
    expect(countAbove(window)).toBe(2);
    expect(selectedEntry(window)).toBe('A');
  });

  it('пустой список сбрасывает состояние', () => {
    const view = new ScrollingView(8);
    repeat(12, () => view.up());
    view.render(ITEMS);

    const window = view.render([]);

    expect(window).toEqual({ kind: 'empty' });
    expect(view.index).toBe(0);
    expect(view.skip).toBe(0);
  });

  it('возвращает окно в границы сократившегося списка', () => {
    const view = new ScrollingView(8);
    repeat(13, () => view.up());
    view.render(ITEMS);

    const shrunk = view.render(FEW_ITEMS);

    expect(view.skip).toBe(0);
    expect(view.index).toBe(2);
    expect(shrunk).toEqual({
      kind: 'non-empty',
      above: [],
      selected: 'C',
      below: ['B', 'A'],
    });
  });

  it('сокращение списка подтягивает skip, сохраняя полное окно', () => {
    const view = new ScrollingView(8);
    repeat(10, () => view.up());
    view.render(ITEMS);

    const window = view.render(ITEMS.slice(0, 9));

    expect(view.skip).toBe(1);
    expect(view.index).toBe(7);
    expect(selectedEntry(window)).toBe('I');
    expect(windowLength(window)).toBe(8);
  });

  it('переживает последовательность 13 -> 0 -> 3 -> 13', () => {
    const view = new ScrollingView(8);
    repeat(13, () => view.up());

    expect(selectedEntry(view.render(ITEMS))).toBe('M');
    expect(view.render([])).toEqual({ kind: 'empty' });
    expect(selectedEntry(view.render(FEW_ITEMS))).toBe('A');

    const window = view.render(ITEMS);
    expect(selectedEntry(window)).toBe('A');
    expect(countAbove(window)).toBe(7);
  });
});
