// Команда fpick pick — интерактивный выбор строки из файла.
import { Command, Option } from 'commander';
import { loadConfig } from '../config/index.js';
import { find } from '../finder.js';
import type { Item } from '../items/types.js';
import { readTable, toItems, loadItems } from '../sources/index.js';
import type { DelimitedRecord } from '../sources/index.js';
import {
  buildOverrides,
  chooseLabelField,
  formatChoice,
  parsePositiveInt,
} from './options.js';
import type { SourceFlags } from './options.js';
import { withSessionLog } from './session-log.js';

// Параметры команды pick.
interface PickOptions extends SourceFlags {
  lines?: number;
  view?: string;
  print?: string;
  logFile?: string;
}

export const pickCommand = new Command('pick')
  .description('Interactively pick an entry from a delimited file')
  .argument('<file>', 'Input file (first line is the header)')
  .option('-c, --config <path>', 'Path to config file')
  .option('-d, --delimiter <char>', 'Field delimiter')
  .option('-l, --label <field>', 'Field shown in the list')
  .option('-n, --lines <n>', 'Number of visible rows', parsePositiveInt)
  .addOption(new Option('--view <strategy>', 'Window strategy').choices(['scrolling', 'fixed']))
  .option('--plain', 'Treat every line as an entry (no header)')
  .option('--print <field>', 'Print only this field of the chosen entry')
  .option('--log-file <path>', 'Write session diagnostics to a file')
  .action(async (file: string, options: PickOptions) => {
    try {
      const config = await loadConfig(options.config, buildOverrides(options));

      let items: Item<DelimitedRecord | string>[];
      if (options.plain) {
        items = await loadItems(file, { delimiter: config.source.delimiter, plain: true });
      } else {
        const table = await readTable(file, config.source.delimiter);
        const labelField =
          config.source.labelField ??
          (await chooseLabelField(table.columns, process.stdin.isTTY === true));
        items = toItems(table, labelField);
      }

      const choice = await withSessionLog(options.logFile, (reporter) =>
        find(items, { config, reporter }),
      );

      if (choice === undefined) {
        process.exitCode = 1;
        return;
      }

      console.log(formatChoice(choice, options.print));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка: ${message}`);
      process.exit(1);
    }
  });
