import type { ChalkInstance } from 'chalk';
import type { ScoredMatch } from '../items/types.js';
import type { ThemeConfig } from '../config/schema.js';
import type { RenderedWindow } from '../view/types.js';
import { windowRows } from '../view/types.js';

export type LineTheme = Pick<ThemeConfig, 'pointer' | 'prompt'>;

// Отступ между указателем и меткой.
const SPACER = '  ';

// Управляющие символы в метке ломают раскладку кадра.
function printable(c: string): string {
  const code = c.codePointAt(0) ?? 0;
  return code < 0x20 || code === 0x7f ? ' ' : c;
}

/**
 * Строка элемента: указатель (или пустое место той же ширины), отступ и метка
 * с подсвеченными совпавшими символами. Позиции вне метки игнорируются.
 * maxWidth ограничивает длину метки в символах.
 */
export function formatLine<T>(
  match: ScoredMatch<T>,
  selected: boolean,
  theme: LineTheme,
  chalk: ChalkInstance,
  maxWidth?: number,
): string {
  let chars = Array.from(match.item.label, printable);
  if (maxWidth !== undefined) {
    chars = chars.slice(0, Math.max(0, maxWidth));
  }

  const matched = new Set(
    match.positions.filter((p) => Number.isInteger(p) && p >= 0 && p < chars.length),
  );

  // Склеиваем соседние символы с одинаковой подсветкой в сегменты.
  let body = '';
  let segment = '';
  let segmentMatched = false;
  const flush = () => {
    if (!segment) {
      return;
    }
    if (segmentMatched) {
      body += chalk.bgBlue(segment);
    } else {
      body += selected ? chalk.bgGray(segment) : segment;
    }
    segment = '';
  };

  chars.forEach((c, i) => {
    const isMatch = matched.has(i);
    if (isMatch !== segmentMatched) {
      flush();
      segmentMatched = isMatch;
    }
    segment += c;
  });
  flush();

  const pointerWidth = Array.from(theme.pointer).length;
  const pointer = selected
    ? chalk.bgGray.green(theme.pointer)
    : chalk.bgGray(' '.repeat(pointerWidth));

  return `${pointer}${chalk.gray(SPACER)}${body}`;
}

/**
 * Строка приглашения с текущим запросом. При maxWidth строка не длиннее
 * maxWidth символов: от запроса остаётся хвост, рядом с курсором.
 */
export function formatPrompt(
  query: string,
  theme: LineTheme,
  chalk: ChalkInstance,
  maxWidth?: number,
): string {
  if (maxWidth === undefined) {
    return `${chalk.blue(theme.prompt)} ${query}`;
  }

  const prompt = Array.from(theme.prompt);
  const room = maxWidth - prompt.length - 1;
  if (room < 0) {
    return chalk.blue(prompt.slice(0, Math.max(0, maxWidth)).join(''));
  }

  const chars = Array.from(query);
  const tail = chars.slice(Math.max(0, chars.length - room)).join('');
  return `${chalk.blue(theme.prompt)} ${tail}`;
}

/**
 * Кадр целиком: capacity строк окна (пустые строки сверху, если совпадений
 * меньше) и строка приглашения последней.
 */
export function renderFrame<T>(
  window: RenderedWindow<ScoredMatch<T>>,
  query: string,
  capacity: number,
  theme: LineTheme,
  chalk: ChalkInstance,
  columns?: number,
): string[] {
  const rows = windowRows(window);
  const labelWidth = columns === undefined
    ? undefined
    : columns - Array.from(theme.pointer).length - SPACER.length;

  const lines: string[] = [];
  for (let i = rows.length; i < capacity; i++) {
    lines.push('');
  }
  for (const row of rows) {
    lines.push(formatLine(row.entry, row.selected, theme, chalk, labelWidth));
  }
  lines.push(formatPrompt(query, theme, chalk, columns));

  return lines;
}
