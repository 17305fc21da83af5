// Barrel-файл модуля сессии.
export type { KeyEvent, SessionState, Renderer } from './types.js';
export type { SessionReporter, MoveDirection } from './reporter.js';
export { NoopReporter, ConsoleReporter } from './reporter.js';
export { SelectionSession } from './session.js';
export type { SelectionSessionOptions } from './session.js';
export { runSession } from './loop.js';
