import type { CommandDefinition } from '../types/index.js';
import { ok } from './result.js';

export const allCommand: CommandDefinition = {
  arity: 0,
  handler: (book) => {
    if (book.size === 0) return ok('No contacts saved.');
    return ok(book.records().map(r => r.toString()).join('\n'));
  },
};
