/**
 * @fileoverview Number formatting and integer helpers for the math commands.
 *
 * @module engine/text/numbers
 */

import { ExpressionError } from '../errors';

/**
 * Parse a whole number, rejecting anything `Number()` would quietly accept
 * (empty strings, hex, trailing garbage).
 */
export function parseInteger(text: string): number | null {
  if (!/^[+-]?\d+$/.test(text)) return null;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Parse a decimal number such as `3`, `-0.5` or `1e3`.
 */
export function parseDecimal(text: string): number | null {
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/.test(text)) return null;
  return Number(text);
}

/**
 * Every positive divisor of `n`, ascending. Trial division up to √n.
 *
 * @example
 * divisors(12)  // [1, 2, 3, 4, 6, 12]
 */
export function divisors(n: number): number[] {
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new ExpressionError(`not a positive integer: ${n}`);
  }
  const low: number[] = [];
  const high: number[] = [];
  for (let i = 1; i * i <= n; i++) {
    if (n % i !== 0) continue;
    low.push(i);
    if (i !== n / i) high.unshift(n / i);
  }
  return [...low, ...high];
}

/**
 * Inclusive arithmetic sequence from `start` towards `end`.
 *
 * @throws ExpressionError when `step` is zero
 */
export function seqRange(start: number, step: number, end: number): number[] {
  if (step === 0) {
    throw new ExpressionError('increment must not be zero');
  }
  const values: number[] = [];
  for (let value = start; step > 0 ? value <= end : value >= end; value += step) {
    values.push(value);
  }
  return values;
}

/**
 * Format a byte count with a binary unit suffix.
 *
 * @example
 * humanSize(512)    // '512B'
 * humanSize(1536)   // '1.5K'
 */
export function humanSize(size: number): string {
  const units = ['B', 'K', 'M', 'G', 'T'];
  let unitIndex = 0;
  let displaySize = size;

  while (displaySize >= 1024 && unitIndex < units.length - 1) {
    displaySize /= 1024;
    unitIndex++;
  }

  if (unitIndex === 0) return `${size}B`;
  return `${displaySize.toFixed(displaySize < 10 ? 1 : 0)}${units[unitIndex]}`;
}

function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/**
 * Exponent with at least two digits, as C and most shells print it.
 */
function exponential(value: number, precision: number): string {
  return value.toExponential(precision).replace(/e([+-])(\d)$/, 'e$10$2');
}

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', '\\': '\\', r: '\r' };

/**
 * Interpret `\n`, `\t`, `\r` and `\\` in a format string.
 */
export function unescape(text: string): string {
  return text.replace(/\\([nt\\r])/g, (_match, ch: string) => ESCAPES[ch]);
}

/**
 * Format a field of a `{...}` template.
 */
function formatField(spec: string, value: number): string {
  const match = /^(,)?(?:\.(\d+))?([fe%])?$/.exec(spec);
  if (!match) {
    throw new ExpressionError(`invalid format spec '{:${spec}}'`);
  }
  const [, comma, precisionText, type] = match;
  const precision = precisionText === undefined ? undefined : Number(precisionText);

  let text: string;
  switch (type) {
    case 'e':
      text = exponential(value, precision ?? 6);
      break;
    case '%':
      text = (value * 100).toFixed(precision ?? 6) + '%';
      break;
    case 'f':
      text = value.toFixed(precision ?? 6);
      break;
    default:
      text = precision === undefined ? String(value) : value.toFixed(precision);
  }

  if (comma) {
    const [whole, ...rest] = text.split('.');
    const sign = whole.startsWith('-') ? '-' : '';
    text = [sign + groupThousands(whole.replace('-', '')), ...rest].join('.');
  }
  return text;
}

/**
 * Substitute a number into a `{}`-style template.
 *
 * Supported fields: `{}`, `{:.2f}`, `{:,}`, `{:,.2f}`, `{:.3e}`, `{:.1%}`.
 *
 * @example
 * formatNumber('{:,.2f}', 1234567.891)  // '1,234,567.89'
 * formatNumber('{:.1%}', 0.25)           // '25.0%'
 */
export function formatNumber(template: string, value: number): string {
  let fields = 0;
  const result = template.replace(/\{(?::([^}]*))?\}/g, (_match, spec: string | undefined) => {
    fields++;
    return formatField(spec ?? '', value);
  });
  if (fields === 0) {
    throw new ExpressionError(`no '{}' field in format '${template}'`);
  }
  return result;
}

function numericArg(value: string, conversion: string): number {
  const parsed = parseDecimal(value);
  if (parsed === null) {
    throw new ExpressionError(`%${conversion}: invalid number '${value}'`);
  }
  return parsed;
}

/**
 * printf-style formatting over string arguments.
 *
 * Conversions: `%s %d %i %f %e %x %o %c %%`, with optional `-`/`0` flag,
 * width and precision. Backslash escapes are interpreted first.
 *
 * @throws ExpressionError for too few or too many arguments, an unknown
 *   conversion or a non-numeric argument to a numeric conversion
 *
 * @example
 * formatPrintf('%s has %d items\n', ['cart', '3'])  // 'cart has 3 items\n'
 * formatPrintf('%.2f', ['3.14159'])                 // '3.14'
 */
export function formatPrintf(format: string, args: readonly string[]): string {
  let next = 0;
  const take = (): string => {
    if (next >= args.length) {
      throw new ExpressionError('not enough arguments for format string');
    }
    return args[next++];
  };

  const result = unescape(format).replace(
    /%([-0]?)(\d*)(?:\.(\d+))?([a-zA-Z%])/g,
    (_match, flag: string, widthText: string, precisionText: string | undefined, conversion: string) => {
      if (conversion === '%') return '%';

      const precision = precisionText === undefined ? undefined : Number(precisionText);
      let text: string;
      switch (conversion) {
        case 's': {
          const value = take();
          text = precision === undefined ? value : value.slice(0, precision);
          break;
        }
        case 'd':
        case 'i':
          text = Math.trunc(numericArg(take(), conversion)).toString();
          break;
        case 'f':
          text = numericArg(take(), conversion).toFixed(precision ?? 6);
          break;
        case 'e':
          text = exponential(numericArg(take(), conversion), precision ?? 6);
          break;
        case 'x':
          text = Math.trunc(numericArg(take(), conversion)).toString(16);
          break;
        case 'o':
          text = Math.trunc(numericArg(take(), conversion)).toString(8);
          break;
        case 'c':
          text = take().charAt(0);
          break;
        default:
          throw new ExpressionError(`unsupported conversion '%${conversion}'`);
      }

      const width = widthText === '' ? 0 : Number(widthText);
      if (flag === '-') return text.padEnd(width);
      if (flag === '0' && conversion !== 's' && conversion !== 'c') {
        const negative = text.startsWith('-');
        const digits = negative ? text.slice(1) : text;
        return (negative ? '-' : '') + digits.padStart(width - (negative ? 1 : 0), '0');
      }
      return text.padStart(width);
    }
  );

  if (next < args.length) {
    throw new ExpressionError('not all arguments converted');
  }
  return result;
}
