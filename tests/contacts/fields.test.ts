import { describe, it, expect } from 'vitest';
import { Birthday, Name, Phone } from '../../src/contacts/fields.js';
import { InvalidBirthdayError, InvalidNameError, InvalidPhoneError } from '../../src/utils/errors.js';

describe('Phone', () => {
  it('should accept exactly ten digits', () => {
    expect(new Phone('1234567890').value).toBe('1234567890');
    expect(new Phone('0000000000').toString()).toBe('0000000000');
  });

  it('should reject numbers that are too short or too long', () => {
    expect(() => new Phone('123456789')).toThrow(InvalidPhoneError);
    expect(() => new Phone('12345678901')).toThrow(InvalidPhoneError);
    expect(() => new Phone('')).toThrow(InvalidPhoneError);
  });

  it('should reject non-digit characters', () => {
    expect(() => new Phone('123456789a')).toThrow(InvalidPhoneError);
    expect(() => new Phone('123-456-78')).toThrow(InvalidPhoneError);
    expect(() => new Phone('+123456789')).toThrow(InvalidPhoneError);
    expect(() => new Phone(' 123456789')).toThrow(InvalidPhoneError);
  });

  it('should report the rule in the error message', () => {
    expect(() => new Phone('12')).toThrow('Phone number must be 10 digits');
  });

  it('should expose validate without constructing', () => {
    expect(Phone.validate('1234567890')).toBe(true);
    expect(Phone.validate('12345')).toBe(false);
  });
});

describe('Birthday', () => {
  it('should accept a real date in DD.MM.YYYY', () => {
    const birthday = new Birthday('15.06.1990');
    expect(birthday.toString()).toBe('15.06.1990');
    expect(birthday.monthDay()).toEqual({ month: 6, day: 15 });
  });

  it('should accept 29 February in a leap year', () => {
    expect(Birthday.validate('29.02.2024')).toBe(true);
  });

  it('should reject 29 February outside a leap year', () => {
    expect(() => new Birthday('29.02.2023')).toThrow(InvalidBirthdayError);
  });

  it('should reject days that do not exist in the month', () => {
    expect(Birthday.validate('30.02.2024')).toBe(false);
    expect(Birthday.validate('31.04.2024')).toBe(false);
    expect(Birthday.validate('00.01.2024')).toBe(false);
    expect(Birthday.validate('10.13.2024')).toBe(false);
  });

  it('should reject other layouts', () => {
    expect(Birthday.validate('1990-06-15')).toBe(false);
    expect(Birthday.validate('5.06.1990')).toBe(false);
    expect(Birthday.validate('15/06/1990')).toBe(false);
    expect(Birthday.validate('15.06.90')).toBe(false);
    expect(Birthday.validate('15.06.1990 ')).toBe(false);
  });

  it('should report the expected format in the error message', () => {
    expect(() => new Birthday('tomorrow')).toThrow('Birthday must be in DD.MM.YYYY format');
  });
});

describe('Name', () => {
  it('should keep the value as given', () => {
    expect(new Name('Alice').value).toBe('Alice');
  });

  it('should reject blank names', () => {
    expect(() => new Name('   ')).toThrow(InvalidNameError);
  });
});
