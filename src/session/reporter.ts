// Репортер событий сессии.
import type { SessionState } from './types.js';

export type MoveDirection = 'up' | 'down';

// Интерфейс репортера сессии.
export interface SessionReporter {
  onRerank(query: string, total: number, matched: number): void;
  onMove(direction: MoveDirection): void;
  onFinish(state: SessionState): void;
}

// Репортер по умолчанию: ничего не пишет, чтобы не портить интерфейс в терминале.
export class NoopReporter implements SessionReporter {
  onRerank(): void {}
  onMove(): void {}
  onFinish(): void {}
}

// Вывод событий в Console (например, поверх файла из --log-file).
export class ConsoleReporter implements SessionReporter {
  constructor(private readonly output: Console) {}

  onRerank(query: string, total: number, matched: number): void {
    this.output.log(`rerank query=${JSON.stringify(query)}: ${matched}/${total} match(es)`);
  }

  onMove(direction: MoveDirection): void {
    this.output.log(`move ${direction}`);
  }

  onFinish(state: SessionState): void {
    this.output.log(`finish ${state}`);
  }
}
