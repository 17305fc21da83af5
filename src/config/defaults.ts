import type { AppConfig } from './schema.js';

// Значения по умолчанию для конфигурации.
// Используются при deep-merge с пользовательским конфигом до валидации.
export const defaultConfig: AppConfig = {
  view: {
    strategy: 'scrolling',
    lines: 8,
  },
  matcher: {
    caseMode: 'smart',
  },
  input: {
    escapeTimeoutMs: 50,
  },
  theme: {
    prompt: '$',
    pointer: '>',
    color: 'auto',
  },
  source: {
    delimiter: ':',
  },
};
