import { DateTime } from 'luxon';
import { logger } from '../utils/index.js';
import { DEFAULT_BIRTHDAY_WINDOW_DAYS, isWithinWindow, projectOntoYear } from './birthdays.js';
import type { ContactRecord } from './record.js';

export class AddressBook {
  private readonly data = new Map<string, ContactRecord>();

  /** Inserts the record under its name, replacing any record already stored there. */
  addRecord(record: ContactRecord): void {
    this.data.set(record.name.value, record);
  }

  has(name: string): boolean {
    return this.data.has(name);
  }

  find(name: string): ContactRecord | undefined {
    return this.data.get(name);
  }

  records(): ContactRecord[] {
    return [...this.data.values()];
  }

  get size(): number {
    return this.data.size;
  }

  /**
   * Names of contacts whose birthday, moved onto the current year, falls within
   * `windowDays` days from `today`. Birthdays that only qualify by wrapping into
   * next year are not reported.
   */
  getBirthdaysPerWeek(
    today: DateTime = DateTime.local(),
    windowDays: number = DEFAULT_BIRTHDAY_WINDOW_DAYS,
  ): string[] {
    const names: string[] = [];
    for (const record of this.data.values()) {
      if (!record.birthday) continue;
      const candidate = projectOntoYear(record.birthday, today);
      if (!candidate) {
        logger.warn(`Skipping birthday of ${record.name.value}: ${record.birthday} has no date in ${today.year}`);
        continue;
      }
      if (isWithinWindow(candidate, today, windowDays)) {
        names.push(record.name.value);
      }
    }
    return names;
  }
}
