import { z } from 'zod';

// Схема окна выбора. lines — ёмкость окна (количество видимых строк).
export const ViewConfigSchema = z.object({
  strategy: z.enum(['scrolling', 'fixed']).default('scrolling'),
  lines: z.number().int().positive().default(8),
});

// Схема сопоставления запроса с метками.
export const MatcherConfigSchema = z.object({
  // smart: регистр учитывается, только если в запросе есть заглавная буква.
  caseMode: z.enum(['smart', 'ignore', 'respect']).default('smart'),
});

// Схема обработки ввода.
export const InputConfigSchema = z.object({
  // Пауза после ESC, после которой он считается отдельной клавишей (мс).
  escapeTimeoutMs: z.number().nonnegative().default(50),
});

// Схема оформления.
export const ThemeConfigSchema = z.object({
  prompt: z.string().default('$'),
  pointer: z.string().default('>'),
  color: z.enum(['auto', 'always', 'never']).default('auto'),
});

// Схема источника элементов.
export const SourceConfigSchema = z.object({
  delimiter: z.string().min(1).default(':'),
  labelField: z.string().optional(),
});

// Корневая схема конфигурации приложения.
export const AppConfigSchema = z.object({
  view: ViewConfigSchema.default(() => ({
    strategy: 'scrolling' as const,
    lines: 8,
  })),
  matcher: MatcherConfigSchema.default(() => ({
    caseMode: 'smart' as const,
  })),
  input: InputConfigSchema.default(() => ({
    escapeTimeoutMs: 50,
  })),
  theme: ThemeConfigSchema.default(() => ({
    prompt: '$',
    pointer: '>',
    color: 'auto' as const,
  })),
  source: SourceConfigSchema.default(() => ({
    delimiter: ':',
  })),
});

// Типы, выведенные из схем.
export type ViewConfig = z.infer<typeof ViewConfigSchema>;
export type MatcherConfig = z.infer<typeof MatcherConfigSchema>;
export type CaseMode = MatcherConfig['caseMode'];
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type ThemeConfig = z.infer<typeof ThemeConfigSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
