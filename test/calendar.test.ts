import { describe, it, expect } from 'vitest';
import { isLeapYear, monthCalendar, yearCalendar } from '../src/engine/text/calendar';

describe('monthCalendar', () => {
  it('should lay out February 2026 starting on Sunday', () => {
    expect(monthCalendar(2026, 2)).toEqual([
      '   February 2026',
      'Su Mo Tu We Th Fr Sa',
      ' 1  2  3  4  5  6  7',
      ' 8  9 10 11 12 13 14',
      '15 16 17 18 19 20 21',
      '22 23 24 25 26 27 28',
    ]);
  });

  it('should offset the first week and include leap days', () => {
    const lines = monthCalendar(2024, 2);
    expect(lines[2]).toBe('             1  2  3');
    expect(lines[lines.length - 1]).toBe('25 26 27 28 29');
  });

  it('should reject an invalid month or year', () => {
    expect(() => monthCalendar(2026, 13)).toThrow('month out of range: 13');
    expect(() => monthCalendar(0, 1)).toThrow('year out of range: 0');
  });
});

describe('yearCalendar', () => {
  it('should center the year and print three months per row', () => {
    const lines = yearCalendar(2026);
    expect(lines[0]).toBe(' '.repeat(31) + '2026');
    expect(lines[1]).toBe('');
    expect(lines[3]).toBe(['Su Mo Tu We Th Fr Sa', 'Su Mo Tu We Th Fr Sa', 'Su Mo Tu We Th Fr Sa'].join('   '));
  });
});

describe('isLeapYear', () => {
  it('should follow the Gregorian rules', () => {
    expect(isLeapYear(2024)).toBe(true);
    expect(isLeapYear(1900)).toBe(false);
    expect(isLeapYear(2000)).toBe(true);
    expect(isLeapYear(2026)).toBe(false);
  });
});
