// Команда fpick filter — неинтерактивное ранжирование строк файла.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { createScorer, rankMatches } from '../matcher/index.js';
import { loadItems } from '../sources/index.js';
import { buildOverrides, formatRankTable, parsePositiveInt } from './options.js';
import type { SourceFlags } from './options.js';

// Параметры команды filter.
interface FilterOptions extends SourceFlags {
  limit: number;
}

export const filterCommand = new Command('filter')
  .description('Print the best matches for a query without the interactive UI')
  .argument('<file>', 'Input file (first line is the header)')
  .argument('<query>', 'Fuzzy query')
  .option('-c, --config <path>', 'Path to config file')
  .option('-d, --delimiter <char>', 'Field delimiter')
  .option('-l, --label <field>', 'Field to match against')
  .option('--plain', 'Treat every line as an entry (no header)')
  .option('--limit <n>', 'Maximum number of matches', parsePositiveInt, 10)
  .action(async (file: string, query: string, options: FilterOptions) => {
    try {
      const config = await loadConfig(options.config, buildOverrides(options));

      const items = await loadItems(file, {
        delimiter: config.source.delimiter,
        labelField: config.source.labelField,
        plain: options.plain,
      });

      const matches = rankMatches(items, query, createScorer(config.matcher))
        .slice(0, options.limit);

      if (matches.length === 0) {
        console.log('Совпадений не найдено.');
        return;
      }

      console.log('');
      for (const line of formatRankTable(matches)) {
        console.log(line);
      }
      console.log('');
      console.log(`Показано: ${matches.length} из ${items.length}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка: ${message}`);
      process.exit(1);
    }
  });
