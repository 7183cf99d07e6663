import type { CommandDefinition } from '../types/index.js';
import { ContactNotFoundError } from '../utils/index.js';
import { fail, ok } from './result.js';

export const phoneCommand: CommandDefinition = {
  arity: 1,
  missingArgumentMessage: 'Error: Missing name.',
  handler: (book, [name]) => {
    const record = book.find(name);
    return record ? ok(record.toString()) : fail(new ContactNotFoundError());
  },
};
