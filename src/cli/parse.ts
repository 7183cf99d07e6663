import type { ParsedInput } from '../types/index.js';

const EXIT_COMMANDS = ['exit', 'close'];

/** Splits a line on whitespace. The command keyword is lower-cased; arguments keep their case. */
export function parseInput(line: string): ParsedInput {
  const [command = '', ...args] = line.trim().split(/\s+/).filter(Boolean);
  return { command: command.toLowerCase(), args };
}

export function isExitCommand(line: string): boolean {
  return EXIT_COMMANDS.includes(line.trim().toLowerCase());
}
