import { DateTime } from 'luxon';
import { DEFAULT_BIRTHDAY_WINDOW_DAYS, type AddressBook } from '../contacts/index.js';
import type { CommandContext, CommandDefinition, CommandName, CommandResult } from '../types/index.js';
import { isCommandName } from '../types/index.js';
import { ContactsError, InvalidCommandError, MissingArgumentError, logger } from '../utils/index.js';
import { addCommand } from './add.js';
import { changeCommand } from './change.js';
import { phoneCommand } from './phone.js';
import { allCommand } from './all.js';
import { addBirthdayCommand, showBirthdayCommand, birthdaysCommand } from './birthday.js';
import { helloCommand } from './hello.js';
import { fail, renderResult } from './result.js';

export { ok, fail, renderResult } from './result.js';

export const COMMANDS = {
  'add': addCommand,
  'change': changeCommand,
  'phone': phoneCommand,
  'all': allCommand,
  'add-birthday': addBirthdayCommand,
  'show-birthday': showBirthdayCommand,
  'birthdays': birthdaysCommand,
  'hello': helloCommand,
} satisfies Record<CommandName, CommandDefinition>;

export function createCommandContext(overrides: Partial<CommandContext> = {}): CommandContext {
  return {
    today: overrides.today ?? (() => DateTime.local()),
    birthdayWindowDays: overrides.birthdayWindowDays ?? DEFAULT_BIRTHDAY_WINDOW_DAYS,
  };
}

/**
 * Runs one command against the book. Validation failures raised by the data
 * model come back as failure results; anything else is a bug and propagates.
 */
export function dispatch(
  book: AddressBook,
  command: string,
  args: string[],
  context: CommandContext = createCommandContext(),
): CommandResult {
  if (!isCommandName(command)) {
    logger.debug('Unknown command:', command);
    return fail(new InvalidCommandError());
  }

  const definition: CommandDefinition = COMMANDS[command];
  if (args.length < definition.arity) {
    return fail(new MissingArgumentError(definition.missingArgumentMessage ?? `Error: ${command} expects ${definition.arity} arguments.`));
  }

  logger.debug('Dispatching', command, args);
  try {
    return definition.handler(book, args.slice(0, definition.arity), context);
  } catch (err) {
    if (err instanceof ContactsError) return fail(err);
    throw err;
  }
}

export function handleCommand(
  book: AddressBook,
  command: string,
  args: string[],
  context?: CommandContext,
): string {
  return renderResult(dispatch(book, command, args, context));
}
