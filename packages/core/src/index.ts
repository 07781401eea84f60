export { logger, Logger, type LogLevel } from './logger';
export { QuadrantError } from './errors';
export { KeyboardState, type KeyboardSnapshot, emptyKeyboardSnapshot } from './input/keyboard-state';
