import { DateTime } from 'luxon';
import { AddressBook, ContactRecord } from '../src/contacts/index.js';
import { createCommandContext } from '../src/commands/index.js';
import type { CommandContext } from '../src/types/index.js';

/** Build a book from `{ name, phones, birthday }` entries, in the given order. */
export function makeBook(entries: Array<{ name: string; phones?: string[]; birthday?: string }>): AddressBook {
  const book = new AddressBook();
  for (const entry of entries) {
    const record = new ContactRecord(entry.name, entry.birthday);
    for (const phone of entry.phones ?? []) record.addPhone(phone);
    book.addRecord(record);
  }
  return book;
}

export function day(iso: string): DateTime {
  return DateTime.fromISO(iso);
}

/** Command context pinned to a fixed date. */
export function contextOn(iso: string, birthdayWindowDays?: number): CommandContext {
  return createCommandContext({ today: () => day(iso), birthdayWindowDays });
}

/** Async line source for driving a session. */
export async function* linesOf(...lines: string[]): AsyncGenerator<string> {
  for (const line of lines) yield line;
}
