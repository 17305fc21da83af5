// Управляющие последовательности терминала.
export const ANSI = {
  clearLine: '\x1b[2K',
  clearDown: '\x1b[0J',
  showCursor: '\x1b[?25h',
  carriageReturn: '\r',
  cursorUp: (lines: number): string => `\x1b[${lines}A`,
} as const;
