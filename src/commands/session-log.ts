// Файл диагностики сессии для --log-file.
import { Console } from 'node:console';
import { createWriteStream } from 'node:fs';
import { ConsoleReporter } from '../session/reporter.js';
import type { SessionReporter } from '../session/reporter.js';

/**
 * Выполняет fn с репортером, пишущим в файл (дописывая в конец).
 * Без пути репортер не создаётся. Файл закрывается и сбрасывается на диск
 * до того, как результат или ошибка fn вернутся вызывающему.
 */
export async function withSessionLog<R>(
  path: string | undefined,
  fn: (reporter: SessionReporter | undefined) => Promise<R>,
): Promise<R> {
  if (!path) {
    return fn(undefined);
  }

  const stream = createWriteStream(path, { flags: 'a' });
  let streamError: Error | undefined;
  stream.on('error', (error) => {
    streamError ??= error;
  });

  try {
    return await fn(new ConsoleReporter(new Console({ stdout: stream, stderr: stream })));
  } finally {
    await new Promise<void>((resolve) => {
      if (stream.closed) {
        resolve();
        return;
      }
      stream.once('close', () => resolve());
      if (!stream.destroyed) {
        stream.end();
      }
    });
    if (streamError) {
      throw new Error(`Cannot write log file ${path}: ${streamError.message}`);
    }
  }
}
