import { z } from 'zod';
import { DateTime } from 'luxon';
import { InvalidBirthdayError, InvalidNameError, InvalidPhoneError } from '../utils/index.js';

export const BIRTHDAY_FORMAT = 'dd.MM.yyyy';

export const phoneSchema = z.string().regex(/^[0-9]{10}$/);

export const birthdaySchema = z
  .string()
  .regex(/^\d{2}\.\d{2}\.\d{4}$/)
  .refine(value => DateTime.fromFormat(value, BIRTHDAY_FORMAT).isValid);

/** A scalar contact attribute that renders as its raw value. */
abstract class Field {
  readonly value: string;

  protected constructor(value: string) {
    this.value = value;
  }

  toString(): string {
    return this.value;
  }
}

export class Name extends Field {
  constructor(value: string) {
    if (!value.trim()) throw new InvalidNameError();
    super(value);
  }
}

export class Phone extends Field {
  constructor(value: string) {
    if (!Phone.validate(value)) throw new InvalidPhoneError();
    super(value);
  }

  static validate(value: string): boolean {
    return phoneSchema.safeParse(value).success;
  }
}

export class Birthday extends Field {
  private readonly date: DateTime;

  constructor(value: string) {
    if (!Birthday.validate(value)) throw new InvalidBirthdayError();
    super(value);
    this.date = DateTime.fromFormat(value, BIRTHDAY_FORMAT);
  }

  static validate(value: string): boolean {
    return birthdaySchema.safeParse(value).success;
  }

  monthDay(): { month: number; day: number } {
    return { month: this.date.month, day: this.date.day };
  }
}
