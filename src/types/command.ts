import type { DateTime } from 'luxon';
import type { AddressBook } from '../contacts/address-book.js';
import type { ContactsError } from '../utils/errors.js';

export const COMMAND_NAMES = [
  'add',
  'change',
  'phone',
  'all',
  'add-birthday',
  'show-birthday',
  'birthdays',
  'hello',
] as const;

export type CommandName = typeof COMMAND_NAMES[number];

export type CommandResult =
  | { ok: true; message: string }
  | { ok: false; error: ContactsError };

export interface CommandContext {
  /** Clock used by date-dependent commands. */
  today: () => DateTime;
  birthdayWindowDays: number;
}

export type CommandHandler = (book: AddressBook, args: string[], context: CommandContext) => CommandResult;

export interface CommandDefinition {
  /** Number of positional arguments the handler reads. */
  arity: number;
  /** Reply used when fewer than `arity` arguments are given. */
  missingArgumentMessage?: string;
  handler: CommandHandler;
}

export interface ParsedInput {
  command: string;
  args: string[];
}

export function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some(name => name === value);
}
