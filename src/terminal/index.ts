// Barrel-файл терминального адаптера.
export { ANSI } from './ansi.js';
export { KeyDecoder } from './keys.js';
export { TerminalInput } from './input.js';
export type { InputStream, TerminalInputOptions } from './input.js';
export { formatLine, formatPrompt, renderFrame } from './format.js';
export type { LineTheme } from './format.js';
export { TerminalRenderer } from './renderer.js';
export type { OutputStream, TerminalRendererOptions } from './renderer.js';
export { withRawTerminal } from './raw-mode.js';
export type { RawInput, RawOutput } from './raw-mode.js';
export { createChalk } from './colors.js';
