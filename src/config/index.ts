// Barrel-файл модуля конфигурации.
export {
  AppConfigSchema,
  ViewConfigSchema,
  MatcherConfigSchema,
  InputConfigSchema,
  ThemeConfigSchema,
  SourceConfigSchema,
} from './schema.js';

export type {
  AppConfig,
  ViewConfig,
  MatcherConfig,
  CaseMode,
  InputConfig,
  ThemeConfig,
  SourceConfig,
} from './schema.js';

export { defaultConfig } from './defaults.js';

export { loadConfig, resolveConfigPath, deepMerge } from './loader.js';
export type { ConfigOverrides } from './loader.js';
