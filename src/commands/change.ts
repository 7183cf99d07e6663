import type { CommandDefinition } from '../types/index.js';
import { ContactNotFoundError, PhoneNotFoundError } from '../utils/index.js';
import { fail, ok } from './result.js';

export const changeCommand: CommandDefinition = {
  arity: 3,
  missingArgumentMessage: 'Error: Missing name, old phone, or new phone number.',
  handler: (book, [name, oldPhone, newPhone]) => {
    const record = book.find(name);
    if (!record) return fail(new ContactNotFoundError());
    if (!record.editPhone(oldPhone, newPhone)) return fail(new PhoneNotFoundError());
    return ok('Contact phone updated.');
  },
};
