export { parseInput, isExitCommand } from './parse.js';
export { runSession, GREETING, FAREWELL } from './session.js';
export type { SessionIO, SessionOptions } from './session.js';
