import type { CommandDefinition } from '../types/index.js';
import { BirthdayNotFoundError, ContactNotFoundError } from '../utils/index.js';
import { fail, ok } from './result.js';

/** Sets the birthday of an existing contact. Unknown names are not created. */
export const addBirthdayCommand: CommandDefinition = {
  arity: 2,
  missingArgumentMessage: 'Error: Missing name or birthday.',
  handler: (book, [name, birthday]) => {
    const record = book.find(name);
    if (!record) return fail(new ContactNotFoundError());
    record.addBirthday(birthday);
    return ok('Birthday added to the contact.');
  },
};

export const showBirthdayCommand: CommandDefinition = {
  arity: 1,
  missingArgumentMessage: 'Error: Missing name.',
  handler: (book, [name]) => {
    const birthday = book.find(name)?.birthday;
    if (!birthday) return fail(new BirthdayNotFoundError());
    return ok(`Birthday of ${name}: ${birthday}`);
  },
};

export const birthdaysCommand: CommandDefinition = {
  arity: 0,
  handler: (book, _args, { today, birthdayWindowDays }) => {
    const names = book.getBirthdaysPerWeek(today(), birthdayWindowDays);
    if (names.length === 0) return ok('No birthdays next week.');
    return ok(['Birthdays next week:', ...names].join('\n'));
  },
};
