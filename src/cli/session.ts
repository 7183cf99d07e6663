import { AddressBook } from '../contacts/index.js';
import { handleCommand } from '../commands/index.js';
import type { CommandContext } from '../types/index.js';
import { logger } from '../utils/index.js';
import { isExitCommand, parseInput } from './parse.js';

export const GREETING = 'Welcome to the assistant bot!';
export const FAREWELL = 'Goodbye!';

export interface SessionIO {
  /** Called before each line is read. */
  prompt: () => void;
  print: (text: string) => void;
}

export interface SessionOptions {
  book?: AddressBook;
  context?: CommandContext;
}

/**
 * Read-eval-print loop over `lines`. Stops on an exit command or when the
 * input ends, and returns the book it worked on.
 */
export async function runSession(
  lines: AsyncIterable<string>,
  io: SessionIO,
  options: SessionOptions = {},
): Promise<AddressBook> {
  const book = options.book ?? new AddressBook();
  const iterator = lines[Symbol.asyncIterator]();

  io.print(GREETING);
  for (;;) {
    io.prompt();
    const next = await iterator.next();
    if (next.done) {
      logger.debug('Input closed');
      break;
    }

    if (isExitCommand(next.value)) {
      await iterator.return?.();
      break;
    }

    const { command, args } = parseInput(next.value);
    io.print(handleCommand(book, command, args, options.context));
  }
  io.print(FAREWELL);

  return book;
}
