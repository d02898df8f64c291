/**
 * Matcher Module Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import { clean } from '../../src/cleaner/index.js';
import { silentLogger } from '../../src/logger/index.js';
import {
  formatCalendarDay,
  matchBirthdays,
  parseCalendarDay,
  resolveCalendarDay,
} from '../../src/matcher/index.js';
import { BIRTHDAY_COLUMNS, createMockLogger, sampleTable, tableOf } from '../helpers.js';

const cleanedSample = () => clean(sampleTable(), { logger: silentLogger }).table;

describe('Matcher Module', () => {
  describe('matchBirthdays', () => {
    it('finds John Doe on January 15th', () => {
      const matches = matchBirthdays(cleanedSample(), { year: 2024, month: 1, day: 15 }, { logger: silentLogger });
      expect(matches).toEqual([{ name: 'John Doe', email: 'john@example.com' }]);
    });

    it('finds Bob Johnson on December 11th', () => {
      const matches = matchBirthdays(cleanedSample(), new Date(2023, 11, 11, 9, 0), { logger: silentLogger });
      expect(matches).toEqual([{ name: 'Bob Johnson', email: 'bob@test.com' }]);
    });

    it('ignores the birth year', () => {
      const matches = matchBirthdays(cleanedSample(), { year: 1850, month: 1, day: 15 }, { logger: silentLogger });
      expect(matches).toHaveLength(1);
    });

    it('returns nothing on a day without birthdays', () => {
      const logger = createMockLogger();
      const matches = matchBirthdays(cleanedSample(), { year: 2024, month: 7, day: 4 }, { logger });

      expect(matches).toEqual([]);
      expect(logger.messages('info')).toEqual(['Checking for birthdays on 07-04', 'Found 0 birthday(s) today']);
    });

    it('returns every match in table order', () => {
      const table = clean(
        tableOf(BIRTHDAY_COLUMNS, [
          { name: 'Zed', email: 'zed@example.com', dob: '2001-06-01' },
          { name: 'Amy', email: 'amy@example.com', dob: '1970-06-01' },
          { name: 'Kim', email: 'kim@example.com', dob: '1970-06-02' },
        ]),
        { logger: silentLogger }
      ).table;

      const matches = matchBirthdays(table, { year: 2024, month: 6, day: 1 }, { logger: silentLogger });

      expect(matches.map((match) => match.name)).toEqual(['Zed', 'Amy']);
    });

    it('matches February 29th only on February 29th', () => {
      const table = clean(
        tableOf(BIRTHDAY_COLUMNS, [{ name: 'Leap', email: 'leap@example.com', dob: '2000-02-29' }]),
        { logger: silentLogger }
      ).table;

      expect(matchBirthdays(table, { year: 2023, month: 2, day: 28 }, { logger: silentLogger })).toEqual([]);
      expect(matchBirthdays(table, { year: 2023, month: 3, day: 1 }, { logger: silentLogger })).toEqual([]);
      expect(matchBirthdays(table, { year: 2024, month: 2, day: 29 }, { logger: silentLogger })).toHaveLength(1);
    });

    it('refuses a table that has not been cleaned', () => {
      const logger = createMockLogger();
      const matches = matchBirthdays(sampleTable(), { year: 2024, month: 1, day: 15 }, { logger });

      expect(matches).toEqual([]);
      expect(logger.messages('error')).toEqual(['Birth date columns not found. Run transformation first.']);
    });

    it('resolves an instant in the given time zone', () => {
      const table = clean(
        tableOf(BIRTHDAY_COLUMNS, [{ name: 'Aki', email: 'aki@example.com', dob: '1995-03-16' }]),
        { logger: silentLogger }
      ).table;
      const instant = new Date('2024-03-15T23:30:00Z');

      expect(matchBirthdays(table, instant, { logger: silentLogger })).toEqual([]);
      expect(matchBirthdays(table, instant, { timeZone: 'Asia/Tokyo', logger: silentLogger })).toEqual([
        { name: 'Aki', email: 'aki@example.com' },
      ]);
    });
  });

  describe('resolveCalendarDay', () => {
    it('uses local time without a zone', () => {
      expect(resolveCalendarDay(new Date('2024-03-15T23:30:00Z'))).toEqual({ year: 2024, month: 3, day: 15 });
    });

    it('shifts across midnight in a zone', () => {
      const instant = new Date('2024-03-15T23:30:00Z');
      expect(resolveCalendarDay(instant, 'Asia/Tokyo')).toEqual({ year: 2024, month: 3, day: 16 });
      expect(resolveCalendarDay(instant, 'America/New_York')).toEqual({ year: 2024, month: 3, day: 15 });
    });
  });

  describe('calendar day strings', () => {
    it('formats with zero padding', () => {
      expect(formatCalendarDay({ year: 2024, month: 1, day: 5 })).toBe('2024-01-05');
    });

    it('parses strict yyyy-MM-dd', () => {
      expect(parseCalendarDay('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
    });

    it.each(['2023-02-29', '2024-13-01', '2024-1-5', '15/01/2024', ''])('rejects %p', (value) => {
      expect(parseCalendarDay(value)).toBeNull();
    });
  });
});
