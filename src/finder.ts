// Интерактивный выбор элемента в терминале.
import { AppConfigSchema } from './config/schema.js';
import type { AppConfig } from './config/schema.js';
import type { Item } from './items/types.js';
import { createScorer } from './matcher/factory.js';
import type { Scorer } from './matcher/types.js';
import { runSession } from './session/loop.js';
import type { SessionReporter } from './session/reporter.js';
import { SelectionSession } from './session/session.js';
import { createChalk } from './terminal/colors.js';
import { TerminalInput } from './terminal/input.js';
import type { InputStream } from './terminal/input.js';
import { withRawTerminal } from './terminal/raw-mode.js';
import type { RawInput } from './terminal/raw-mode.js';
import { TerminalRenderer } from './terminal/renderer.js';
import type { OutputStream } from './terminal/renderer.js';
import { createView } from './view/factory.js';

export interface FindOptions {
  config?: AppConfig;
  scorer?: Scorer;
  reporter?: SessionReporter;
  stdin?: RawInput & InputStream;
  stdout?: OutputStream;
}

/**
 * Показывает окно выбора и ждёт подтверждения или отмены.
 * Возвращает данные выбранного элемента или undefined.
 */
export async function find<T>(
  items: readonly Item<T>[],
  options: FindOptions = {},
): Promise<T | undefined> {
  const config = options.config ?? AppConfigSchema.parse({});
  const stdin = options.stdin ?? process.stdin;
  const stdout = options.stdout ?? process.stdout;

  const view = createView(config.view);
  const session = new SelectionSession(items, {
    scorer: options.scorer ?? createScorer(config.matcher),
    view,
    reporter: options.reporter,
  });
  const renderer = new TerminalRenderer<T>(stdout, {
    capacity: view.capacity,
    theme: config.theme,
    chalk: createChalk(config.theme.color),
  });
  const input = new TerminalInput(stdin, {
    escapeTimeoutMs: config.input.escapeTimeoutMs,
  });

  return withRawTerminal(stdin, stdout, async () => {
    try {
      return await runSession(session, input, renderer);
    } finally {
      renderer.clear();
    }
  });
}
