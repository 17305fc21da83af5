import { readFile, stat } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { AppConfigSchema } from './schema.js';
import { defaultConfig } from './defaults.js';
import type { AppConfig } from './schema.js';

// Частичная конфигурация: значения из файла или из флагов CLI.
export type ConfigOverrides = Record<string, unknown>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Рекурсивный deep-merge двух объектов.
 * Значения из source перезаписывают target, кроме случаев когда оба значения — объекты.
 * Массивы из source полностью заменяют массивы в target (не сливаются).
 * undefined в source пропускается: незаданный флаг CLI не стирает значение из файла.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }

    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// Имя конфиг-файла в текущей директории и каталог в ~/.config.
const LOCAL_CONFIG_FILE = 'fpick.config.yaml';
const USER_CONFIG_DIR = 'fpick';

// Существует ли обычный файл (директория с тем же именем не подходит).
async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

// Явно указанный путь обязан существовать: origin попадает в текст ошибки.
async function requireConfigFile(filePath: string, origin: string): Promise<string> {
  const resolved = resolve(filePath);
  if (!(await isFile(resolved))) {
    throw new Error(`Config file not found at ${origin}: ${resolved}`);
  }
  return resolved;
}

/**
 * Путь к конфиг-файлу: --config, затем FPICK_CONFIG (оба обязаны указывать
 * на существующий файл), затем ./fpick.config.yaml и ~/.config/fpick/config.yaml.
 * null, если ничего не найдено.
 */
export async function resolveConfigPath(configPath?: string): Promise<string | null> {
  if (configPath) {
    return requireConfigFile(configPath, 'path');
  }

  const envConfigPath = process.env['FPICK_CONFIG'];
  if (envConfigPath) {
    return requireConfigFile(envConfigPath, 'FPICK_CONFIG path');
  }

  const candidates = [
    resolve(LOCAL_CONFIG_FILE),
    join(homedir(), '.config', USER_CONFIG_DIR, 'config.yaml'),
  ];
  for (const candidate of candidates) {
    if (await isFile(candidate)) {
      return candidate;
    }
  }

  return null;
}

// Читает YAML-файл конфигурации. Пустой файл даёт пустой объект.
async function readConfigFile(path: string): Promise<ConfigOverrides> {
  const raw = await readFile(path, 'utf-8');
  const parsed: unknown = parseYaml(raw);

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file must contain a YAML mapping: ${path}`);
  }
  return parsed;
}

/**
 * Загружает конфигурацию.
 *
 * 1. Определяет путь к конфиг-файлу (аргумент или поиск).
 * 2. Deep merge файла поверх дефолтов.
 * 3. Deep merge переопределений из CLI поверх результата.
 * 4. Валидирует через AppConfigSchema.parse().
 */
export async function loadConfig(
  configPath?: string,
  overrides: ConfigOverrides = {},
): Promise<AppConfig> {
  const resolvedPath = await resolveConfigPath(configPath);
  const fromFile = resolvedPath ? await readConfigFile(resolvedPath) : {};

  const merged = deepMerge(deepMerge(defaultConfig, fromFile), overrides);

  return AppConfigSchema.parse(merged);
}
