import { describe, it, expect } from 'vitest';
import { Birthday } from '../../src/contacts/fields.js';
import { isWithinWindow, projectOntoYear } from '../../src/contacts/birthdays.js';
import { day } from '../helpers.js';

describe('projectOntoYear', () => {
  it('should keep month and day and take the year of today', () => {
    const projected = projectOntoYear(new Birthday('15.06.1990'), day('2026-03-01'));
    expect(projected?.toISODate()).toBe('2026-06-15');
  });

  it('should return null for 29 February in a non-leap year', () => {
    expect(projectOntoYear(new Birthday('29.02.2000'), day('2026-03-01'))).toBeNull();
  });
});

describe('isWithinWindow', () => {
  const today = day('2026-06-10T15:30:00');

  it('should include both ends of the window', () => {
    expect(isWithinWindow(day('2026-06-10'), today, 7)).toBe(true);
    expect(isWithinWindow(day('2026-06-17'), today, 7)).toBe(true);
  });

  it('should exclude days outside the window', () => {
    expect(isWithinWindow(day('2026-06-09'), today, 7)).toBe(false);
    expect(isWithinWindow(day('2026-06-18'), today, 7)).toBe(false);
  });
});
