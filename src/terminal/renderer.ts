import type { ChalkInstance } from 'chalk';
import type { ScoredMatch } from '../items/types.js';
import type { Renderer } from '../session/types.js';
import type { RenderedWindow } from '../view/types.js';
import { ANSI } from './ansi.js';
import { renderFrame } from './format.js';
import type { LineTheme } from './format.js';

// Поток вывода терминала. columns есть только у TTY.
export interface OutputStream {
  write(chunk: string): boolean;
  columns?: number;
}

export interface TerminalRendererOptions {
  capacity: number;
  theme: LineTheme;
  chalk: ChalkInstance;
}

// Рисует кадр на месте предыдущего. Курсор остаётся в конце строки приглашения.
export class TerminalRenderer<T> implements Renderer<T> {
  private drawn = false;

  constructor(
    private readonly output: OutputStream,
    private readonly options: TerminalRendererOptions,
  ) {}

  draw(window: RenderedWindow<ScoredMatch<T>>, query: string): void {
    const { capacity, theme, chalk } = this.options;
    const lines = renderFrame(window, query, capacity, theme, chalk, this.output.columns);

    const frame = lines.map((line) => `${ANSI.clearLine}${line}`).join('\n');
    this.output.write(this.drawn ? `${this.toFrameStart()}${frame}` : frame);
    this.drawn = true;
  }

  // Стирает последний кадр.
  clear(): void {
    if (!this.drawn) {
      return;
    }
    this.output.write(`${this.toFrameStart()}${ANSI.clearDown}`);
    this.drawn = false;
  }

  private toFrameStart(): string {
    return `${ANSI.carriageReturn}${ANSI.cursorUp(this.options.capacity)}`;
  }
}
