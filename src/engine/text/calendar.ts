/**
 * @fileoverview Month and year calendars in the traditional `cal` layout
 * (weeks start on Sunday).
 *
 * @module engine/text/calendar
 */

import { ExpressionError } from '../errors';

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

const WEEKDAY_HEADER = 'Su Mo Tu We Th Fr Sa';
const MONTH_WIDTH = WEEKDAY_HEADER.length;
const MONTH_GAP = '   ';

function center(text: string, width: number): string {
  const left = Math.max(0, Math.floor((width - text.length) / 2));
  return ' '.repeat(left) + text;
}

function validate(year: number, month: number): void {
  if (!Number.isInteger(year) || year < 1 || year > 9999) {
    throw new ExpressionError(`year out of range: ${year}`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new ExpressionError(`month out of range: ${month}`);
  }
}

/**
 * Weekday-aligned rows for one month, without trailing blanks.
 */
function monthBody(year: number, month: number, withYear: boolean): string[] {
  const first = new Date(0);
  first.setUTCFullYear(year, month - 1, 1);
  const offset = first.getUTCDay();
  const days = month === 2 && isLeapYear(year) ? 29 : DAYS_IN_MONTH[month - 1];

  const title = withYear ? `${MONTH_NAMES[month - 1]} ${year}` : MONTH_NAMES[month - 1];
  const lines = [center(title, MONTH_WIDTH), WEEKDAY_HEADER];

  let cells: string[] = Array<string>(offset).fill('  ');
  for (let day = 1; day <= days; day++) {
    cells.push(String(day).padStart(2));
    if (cells.length === 7) {
      lines.push(cells.join(' '));
      cells = [];
    }
  }
  if (cells.length > 0) lines.push(cells.join(' '));

  return lines.map(line => line.trimEnd());
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * One month, titled with the month name and year.
 *
 * @example
 * monthCalendar(2026, 2)[0]  // '   February 2026'
 */
export function monthCalendar(year: number, month: number): string[] {
  validate(year, month);
  return monthBody(year, month, true);
}

/**
 * A full year, three months per row.
 */
export function yearCalendar(year: number): string[] {
  validate(year, 1);
  const rowWidth = MONTH_WIDTH * 3 + MONTH_GAP.length * 2;
  const lines = [center(String(year), rowWidth), ''];

  for (let quarter = 0; quarter < 4; quarter++) {
    const months = [1, 2, 3].map(i => monthBody(year, quarter * 3 + i, false));
    const height = Math.max(...months.map(body => body.length));
    for (let row = 0; row < height; row++) {
      lines.push(
        months.map(body => (body[row] ?? '').padEnd(MONTH_WIDTH)).join(MONTH_GAP).trimEnd()
      );
    }
    if (quarter < 3) lines.push('');
  }

  return lines;
}
