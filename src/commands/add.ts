import { ContactRecord } from '../contacts/index.js';
import type { CommandDefinition } from '../types/index.js';
import { ok } from './result.js';

export const addCommand: CommandDefinition = {
  arity: 2,
  missingArgumentMessage: 'Error: Missing name or phone number.',
  handler: (book, [name, phone]) => {
    const existing = book.find(name);
    if (existing) {
      existing.addPhone(phone);
      return ok('Phone number added to the existing contact.');
    }

    // A rejected phone must not leave an empty contact behind.
    const record = new ContactRecord(name);
    record.addPhone(phone);
    book.addRecord(record);
    return ok('Contact added.');
  },
};
