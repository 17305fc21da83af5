// Barrel-файл модуля источников элементов.
export { parseDelimited, parsePlain, toItems, readTable, loadItems } from './delimited.js';
export type { DelimitedRecord, DelimitedTable, LoadOptions } from './delimited.js';
