import type { CommandDefinition } from '../types/index.js';
import { ok } from './result.js';

export const helloCommand: CommandDefinition = {
  arity: 0,
  handler: () => ok('How can I help you?'),
};
