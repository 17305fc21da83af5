import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import { find } from '../finder.js';
import { AppConfigSchema } from '../config/schema.js';
import { createItem } from '../items/types.js';

const ITEMS = ['Frodo', 'Sam', 'Merry', 'Pippin'].map((name) => createItem(name, { name }));

// Терминал в памяти: stdin — EventEmitter с raw-режимом, stdout копит вывод.
class FakeStdin extends EventEmitter {
  readonly isTTY = true;
  readonly setRawMode = vi.fn();
  readonly resume = vi.fn();
  readonly pause = vi.fn();
}

class FakeStdout {
  readonly writes: string[] = [];

  write(chunk: string): boolean {
    this.writes.push(chunk);
    return true;
  }
}

const config = AppConfigSchema.parse({ theme: { color: 'never' }, view: { lines: 3 } });

describe('find', () => {
  it('возвращает данные выбранного элемента', async () => {
    const stdin = new FakeStdin();
    const stdout = new FakeStdout();

    const result = find(ITEMS, { config, stdin, stdout });
    stdin.emit('data', 'sa\r');

    expect(await result).toEqual({ name: 'Sam' });
    expect(stdin.setRawMode.mock.calls).toEqual([[true], [false]]);
    expect(stdin.listenerCount('data')).toBe(0);
  });

  it('рисует окно и стирает его после выбора', async () => {
    const stdin = new FakeStdin();
    const stdout = new FakeStdout();

    const result = find(ITEMS, { config, stdin, stdout });
    stdin.emit('data', '\r');
    await result;

    expect(stdout.writes[0]).toBe('\x1b[2K   Merry\n\x1b[2K   Sam\n\x1b[2K>  Frodo\n\x1b[2K$ ');
    expect(stdout.writes.slice(-2)).toEqual(['\r\x1b[3A\x1b[0J', '\x1b[?25h']);
  });

  it('стрелка вверх выбирает следующий элемент', async () => {
    const stdin = new FakeStdin();

    const result = find(ITEMS, { config, stdin, stdout: new FakeStdout() });
    stdin.emit('data', '\x1b[A\x1b[A\r');

    expect(await result).toEqual({ name: 'Merry' });
  });

  it('Ctrl-C отменяет выбор', async () => {
    const stdin = new FakeStdin();

    const result = find(ITEMS, { config, stdin, stdout: new FakeStdout() });
    stdin.emit('data', '\x03');

    expect(await result).toBeUndefined();
    expect(stdin.setRawMode).toHaveBeenLastCalledWith(false);
  });

  it('подтверждение без совпадений ничего не возвращает', async () => {
    const stdin = new FakeStdin();

    const result = find(ITEMS, { config, stdin, stdout: new FakeStdout() });
    stdin.emit('data', 'qqq\r');

    expect(await result).toBeUndefined();
  });
});
