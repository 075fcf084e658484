// src/parsers/temporalParser.test.ts
import { describe, it, expect } from 'vitest';
import {
  parseCalendarDate,
  parseTemporal,
  parseTimeOfDay,
  tryParseTemporal,
} from './temporalParser.js';
import { UnparseableTemporalError } from '../lib/errors.js';

describe('temporalParser', () => {
  describe('parseTemporal', () => {
    it('should keep the wall clock of an RFC 3339 value without applying the offset', () => {
      expect(parseTemporal('2024-03-15T19:30:00-07:00')).toEqual({ date: '2024-03-15', time: '19:30:00' });
      expect(parseTemporal('2024-03-15T19:30:00.123Z')).toEqual({ date: '2024-03-15', time: '19:30:00' });
      expect(parseTemporal('2024-03-15 19:30:00+01:00')).toEqual({ date: '2024-03-15', time: '19:30:00' });
    });

    it('should parse naive ISO date-times with and without seconds', () => {
      expect(parseTemporal('2024-03-15T19:30:00')).toEqual({ date: '2024-03-15', time: '19:30:00' });
      expect(parseTemporal('2024-03-15T19:30')).toEqual({ date: '2024-03-15', time: '19:30:00' });
      expect(parseTemporal('2024-03-15 08:05')).toEqual({ date: '2024-03-15', time: '08:05:00' });
    });

    it('should parse US dates with AM/PM in any case', () => {
      expect(parseTemporal('3/15/2024 7:30 PM')).toEqual({ date: '2024-03-15', time: '19:30:00' });
      expect(parseTemporal('3/15/2024 7:30pm')).toEqual({ date: '2024-03-15', time: '19:30:00' });
      expect(parseTemporal('12/25/2024 12:00 AM')).toEqual({ date: '2024-12-25', time: '00:00:00' });
      expect(parseTemporal('12/25/2024 12:15:30 PM')).toEqual({ date: '2024-12-25', time: '12:15:30' });
    });

    it('should return a date with no time for date-only input', () => {
      const parsed = parseTemporal('2024-03-15');

      expect(parsed).toEqual({ date: '2024-03-15' });
      expect('time' in parsed).toBe(false);
    });

    it('should read ambiguous slashed dates month first', () => {
      expect(parseTemporal('03/04/2024')).toEqual({ date: '2024-03-04' });
    });

    it('should fall back to day first when month first is impossible', () => {
      expect(parseTemporal('25/12/2024')).toEqual({ date: '2024-12-25' });
    });

    it('should accept year-first slashes and month-first dashes', () => {
      expect(parseTemporal('2024/12/25')).toEqual({ date: '2024-12-25' });
      expect(parseTemporal('12-25-2024')).toEqual({ date: '2024-12-25' });
    });

    it('should ignore surrounding whitespace', () => {
      expect(parseTemporal('  2024-03-15  ')).toEqual({ date: '2024-03-15' });
    });

    it('should reject dates that do not exist', () => {
      expect(() => parseTemporal('2024-02-30')).toThrow(UnparseableTemporalError);
      expect(() => parseTemporal('2024-02-30')).toThrow("Could not parse date/time: '2024-02-30'");
    });

    it('should reject out-of-range times', () => {
      expect(() => parseTemporal('2024-03-15T25:00:00')).toThrow(UnparseableTemporalError);
      expect(() => parseTemporal('3/15/2024 13:00 PM')).toThrow(UnparseableTemporalError);
    });

    it('should reject free text', () => {
      expect(() => parseTemporal('next tuesday')).toThrow(UnparseableTemporalError);
    });
  });

  describe('tryParseTemporal', () => {
    it('should return undefined instead of throwing', () => {
      expect(tryParseTemporal('not a date')).toBeUndefined();
      expect(tryParseTemporal('2024-07-04')).toEqual({ date: '2024-07-04' });
    });

    it('should accept four-digit years below 100', () => {
      expect(tryParseTemporal('0099-01-01')).toEqual({ date: '0099-01-01' });
    });
  });

  describe('parseCalendarDate', () => {
    it('should parse date-only formats', () => {
      expect(parseCalendarDate('7/4/2024')).toBe('2024-07-04');
    });

    it('should reject values carrying a time', () => {
      expect(() => parseCalendarDate('2024-03-15T19:30:00')).toThrow(UnparseableTemporalError);
    });
  });

  describe('parseTimeOfDay', () => {
    it('should parse 24-hour times', () => {
      expect(parseTimeOfDay('7:05')).toBe('07:05:00');
      expect(parseTimeOfDay('19:30:15')).toBe('19:30:15');
    });

    it('should parse 12-hour times', () => {
      expect(parseTimeOfDay('7:30 PM')).toBe('19:30:00');
      expect(parseTimeOfDay('12:15am')).toBe('00:15:00');
      expect(parseTimeOfDay('11:59:59 pm')).toBe('23:59:59');
    });

    it('should reject an impossible 12-hour value', () => {
      expect(() => parseTimeOfDay('13:00 PM')).toThrow("Could not parse date/time: '13:00 PM'");
    });
  });
});
