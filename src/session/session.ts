import { rankMatches } from '../matcher/ranking.js';
import { SubsequenceScorer } from '../matcher/subsequence.js';
import { ScrollingView } from '../view/scrolling-view.js';
import { selectedEntry } from '../view/types.js';
import type { Item, ScoredMatch } from '../items/types.js';
import type { Scorer } from '../matcher/types.js';
import type { RenderedWindow, View } from '../view/types.js';
import { NoopReporter } from './reporter.js';
import type { SessionReporter } from './reporter.js';
import type { SessionState } from './types.js';

// Ёмкость окна по умолчанию.
const DEFAULT_CAPACITY = 8;

export interface SelectionSessionOptions {
  scorer?: Scorer;
  // Готовая стратегия окна. По умолчанию — ScrollingView(capacity).
  view?: View;
  capacity?: number;
  reporter?: SessionReporter;
}

/**
 * Сессия выбора: полный набор элементов, текущий запрос, ранжированный список
 * и стратегия окна.
 *
 * Каждое изменение запроса заново ранжирует все элементы. Список и состояние
 * окна меняются вместе внутри одного синхронного вызова, поэтому частично
 * перестроенный список никогда не попадает в render().
 */
export class SelectionSession<T> {
  private readonly items: readonly Item<T>[];
  private readonly scorer: Scorer;
  private readonly view: View;
  private readonly reporter: SessionReporter;
  private currentQuery = '';
  private ranked: ScoredMatch<T>[] = [];
  private currentState: SessionState = 'active';

  constructor(items: readonly Item<T>[], options: SelectionSessionOptions = {}) {
    this.items = Object.freeze([...items]);
    this.scorer = options.scorer ?? new SubsequenceScorer();
    this.view = options.view ?? new ScrollingView(options.capacity ?? DEFAULT_CAPACITY);
    this.reporter = options.reporter ?? new NoopReporter();
    this.rerank();
  }

  get query(): string {
    return this.currentQuery;
  }

  get matches(): readonly ScoredMatch<T>[] {
    return this.ranked;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get capacity(): number {
    return this.view.capacity;
  }

  // Окно поверх текущего списка совпадений.
  render(): RenderedWindow<ScoredMatch<T>> {
    return this.view.render(this.ranked);
  }

  onQueryAppend(text: string): void {
    this.assertActive();
    this.currentQuery += text;
    this.rerank();
  }

  // Удаляет последний символ запроса. На пустом запросе только переранжирует.
  onQueryBackspace(): void {
    this.assertActive();
    this.currentQuery = Array.from(this.currentQuery).slice(0, -1).join('');
    this.rerank();
  }

  onMoveUp(): void {
    this.assertActive();
    this.view.up();
    this.clamp();
    this.reporter.onMove('up');
  }

  onMoveDown(): void {
    this.assertActive();
    this.view.down();
    this.clamp();
    this.reporter.onMove('down');
  }

  // Возвращает данные выбранного элемента. Пустой список равносилен отмене.
  onConfirm(): T | undefined {
    this.assertActive();
    const selected = selectedEntry(this.render());

    if (!selected) {
      this.finish('cancelled');
      return undefined;
    }

    this.finish('confirmed');
    return selected.item.payload;
  }

  onCancel(): undefined {
    this.assertActive();
    this.finish('cancelled');
    return undefined;
  }

  private rerank(): void {
    this.ranked = rankMatches(this.items, this.currentQuery, this.scorer);
    this.reporter.onRerank(this.currentQuery, this.items.length, this.ranked.length);
  }

  // up() не видит длины списка: после шага окно сразу приводится к её границам.
  private clamp(): void {
    this.view.render(this.ranked);
  }

  private finish(state: SessionState): void {
    this.currentState = state;
    this.reporter.onFinish(state);
  }

  private assertActive(): void {
    if (this.currentState !== 'active') {
      throw new Error(`Selection session is already ${this.currentState}`);
    }
  }
}
