import { StringDecoder } from 'node:string_decoder';
import type { KeyEvent } from '../session/types.js';
import { KeyDecoder } from './keys.js';

// Источник сырого ввода: process.stdin или любой EventEmitter с событиями data/end.
export interface InputStream {
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  on(event: 'end', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'end', listener: () => void): unknown;
  off(event: 'error', listener: (error: Error) => void): unknown;
}

export interface TerminalInputOptions {
  // Пауза после одиночного ESC, после которой он считается отменой.
  escapeTimeoutMs: number;
}

// Ленивая последовательность событий клавиатуры поверх потока ввода.
export class TerminalInput implements AsyncIterable<KeyEvent> {
  constructor(
    private readonly stream: InputStream,
    private readonly options: TerminalInputOptions,
  ) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<KeyEvent> {
    const decoder = new KeyDecoder();
    const utf8 = new StringDecoder('utf8');
    const queue: KeyEvent[] = [];
    let ended = false;
    let failure: Error | undefined;
    let timer: NodeJS.Timeout | undefined;
    let wake: (() => void) | undefined;

    const notify = () => {
      const resolve = wake;
      wake = undefined;
      resolve?.();
    };

    const cancelTimer = () => {
      if (timer) {
        clearTimeout(timer);
        timer = undefined;
      }
    };

    const onData = (chunk: Buffer | string) => {
      cancelTimer();
      const text = typeof chunk === 'string' ? chunk : utf8.write(chunk);
      queue.push(...decoder.decode(text));

      if (decoder.hasPending) {
        timer = setTimeout(() => {
          timer = undefined;
          queue.push(...decoder.flush());
          notify();
        }, this.options.escapeTimeoutMs);
      }
      notify();
    };

    const onEnd = () => {
      cancelTimer();
      queue.push(...decoder.flush());
      ended = true;
      notify();
    };

    const onError = (error: Error) => {
      failure = error;
      notify();
    };

    this.stream.on('data', onData);
    this.stream.on('end', onEnd);
    this.stream.on('error', onError);

    try {
      for (;;) {
        const event = queue.shift();
        if (event) {
          yield event;
          continue;
        }
        if (failure) {
          throw failure;
        }
        if (ended) {
          return;
        }
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
      }
    } finally {
      cancelTimer();
      this.stream.off('data', onData);
      this.stream.off('end', onEnd);
      this.stream.off('error', onError);
    }
  }
}
