// Общие помощники команд pick и filter.
import { InvalidArgumentError } from 'commander';
import { select } from '@inquirer/prompts';
import type { ConfigOverrides } from '../config/index.js';
import type { ScoredMatch } from '../items/types.js';
import type { DelimitedRecord } from '../sources/index.js';

// Флаги, общие для команд, которые читают файл.
export interface SourceFlags {
  config?: string;
  delimiter?: string;
  label?: string;
  plain?: boolean;
}

// Парсер положительного целого для commander.
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}

// Переопределения конфигурации из флагов CLI. Незаданные флаги остаются undefined.
export function buildOverrides(
  flags: SourceFlags & { lines?: number; view?: string },
): ConfigOverrides {
  return {
    view: { lines: flags.lines, strategy: flags.view },
    source: { delimiter: flags.delimiter, labelField: flags.label },
  };
}

/**
 * Поле для меток. Если колонок несколько и терминал интерактивный,
 * спрашиваем пользователя, иначе берём первую.
 */
export async function chooseLabelField(
  columns: string[],
  interactive: boolean,
): Promise<string | undefined> {
  if (columns.length <= 1 || !interactive) {
    return columns[0];
  }

  return select({
    message: 'Выберите поле для меток:',
    choices: columns.map((column) => ({ name: column, value: column })),
  });
}

// Вывод выбранного элемента: поле записи, строка целиком или JSON.
export function formatChoice(choice: DelimitedRecord | string, field?: string): string {
  if (typeof choice === 'string') {
    return choice;
  }
  if (field === undefined) {
    return JSON.stringify(choice);
  }

  const value = choice[field];
  if (value === undefined) {
    throw new Error(
      `Unknown field "${field}". Available fields: ${Object.keys(choice).join(', ')}`,
    );
  }
  return value;
}

// Таблица результатов filter: оценка и метка.
export function formatRankTable<T>(matches: readonly ScoredMatch<T>[]): string[] {
  const COL_SCORE = 8;

  const header = 'Оценка'.padEnd(COL_SCORE) + ' ' + 'Метка';
  const lines = [header, '-'.repeat(header.length + 20)];

  for (const match of matches) {
    lines.push(`${String(match.score).padEnd(COL_SCORE)} ${match.item.label}`);
  }

  return lines;
}
