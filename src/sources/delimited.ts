// Загрузка элементов из текстовых файлов с разделителями.
import { readFile } from 'node:fs/promises';
import { createItem } from '../items/types.js';
import type { Item } from '../items/types.js';

// Запись файла: имя колонки из заголовка -> значение.
export type DelimitedRecord = Record<string, string>;

export interface DelimitedTable {
  columns: string[];
  records: DelimitedRecord[];
}

export interface LoadOptions {
  delimiter: string;
  // Колонка с меткой. По умолчанию — первая.
  labelField?: string;
  // Каждая строка файла — отдельный элемент, без заголовка.
  plain?: boolean;
}

// Разбивает текст на строки, отбрасывая \r и пустые строки.
function nonEmptyLines(text: string): Array<{ line: string; lineNumber: number }> {
  return text
    .split('\n')
    .map((line, index) => ({ line: line.replace(/\r$/, ''), lineNumber: index + 1 }))
    .filter(({ line }) => line.length > 0);
}

/**
 * Разбирает текст с разделителями. Первая непустая строка — заголовок.
 * Запись с другим количеством полей — ошибка с номером строки.
 */
export function parseDelimited(text: string, delimiter: string): DelimitedTable {
  if (delimiter.length === 0) {
    throw new Error('Delimiter must not be empty');
  }

  const lines = nonEmptyLines(text);
  const header = lines.shift();
  if (!header) {
    return { columns: [], records: [] };
  }

  const columns = header.line.split(delimiter);
  const records: DelimitedRecord[] = [];

  for (const { line, lineNumber } of lines) {
    const fields = line.split(delimiter);
    if (fields.length !== columns.length) {
      throw new Error(
        `Line ${lineNumber}: expected ${columns.length} field(s), found ${fields.length}`,
      );
    }

    const record: DelimitedRecord = {};
    columns.forEach((column, i) => {
      record[column] = fields[i]!;
    });
    records.push(record);
  }

  return { columns, records };
}

// Каждая непустая строка — элемент с меткой и данными, равными строке.
export function parsePlain(text: string): Item<string>[] {
  return nonEmptyLines(text).map(({ line }) => createItem(line, line));
}

// Элементы из записей таблицы по колонке метки.
export function toItems(table: DelimitedTable, labelField?: string): Item<DelimitedRecord>[] {
  const field = labelField ?? table.columns[0];
  if (field === undefined) {
    return [];
  }
  if (!table.columns.includes(field)) {
    throw new Error(
      `Unknown label field "${field}". Available fields: ${table.columns.join(', ')}`,
    );
  }

  return table.records.map((record) => createItem(record[field] ?? '', record));
}

// Читает файл целиком (UTF-8).
export async function readTable(path: string, delimiter: string): Promise<DelimitedTable> {
  const text = await readFile(path, 'utf-8');
  return parseDelimited(text, delimiter);
}

// Загружает элементы из файла.
export async function loadItems(
  path: string,
  options: LoadOptions,
): Promise<Item<DelimitedRecord | string>[]> {
  const text = await readFile(path, 'utf-8');

  if (options.plain) {
    return parsePlain(text);
  }

  return toItems(parseDelimited(text, options.delimiter), options.labelField);
}
