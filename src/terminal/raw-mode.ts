import { ANSI } from './ansi.js';

// Вход терминала, который можно перевести в raw-режим.
export interface RawInput {
  isTTY?: boolean;
  setRawMode(mode: boolean): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface RawOutput {
  write(chunk: string): boolean;
}

/**
 * Raw-режим терминала на время выполнения fn.
 * Состояние восстанавливается на любом выходе: выбор, отмена или ошибка.
 */
export async function withRawTerminal<R>(
  stdin: RawInput,
  stdout: RawOutput,
  fn: () => Promise<R>,
): Promise<R> {
  if (!stdin.isTTY) {
    throw new Error('Interactive selection requires a TTY on stdin');
  }

  stdin.setRawMode(true);
  stdin.resume();

  try {
    return await fn();
  } finally {
    stdin.setRawMode(false);
    stdin.pause();
    stdout.write(ANSI.showCursor);
  }
}
