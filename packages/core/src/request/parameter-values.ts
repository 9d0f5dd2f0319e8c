import { InvalidArgumentError } from '../errors.ts';

export type PrimitiveParameter = string | number | boolean;

/**
 * Values accepted in path and query parameter maps.
 */
export type ParameterValue =
  | PrimitiveParameter
  | null
  | undefined
  | Date
  | DateOnly
  | readonly PrimitiveParameter[];

/**
 * A parameter value after sanitization: only what the template engine expands.
 */
export type SanitizedValue = PrimitiveParameter | null | PrimitiveParameter[];

export type ParameterMap = Record<string, ParameterValue>;

const DATE_ONLY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * A calendar date with no time of day, rendered as `YYYY-MM-DD`.
 */
export class DateOnly {
  static fromDate(date: Date): DateOnly {
    assertValidDate(date);
    return new DateOnly(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
  }

  static parse(value: string): DateOnly {
    const match = DATE_ONLY_PATTERN.exec(value);
    if (!match) {
      throw new InvalidArgumentError(`"${value}" is not a date in YYYY-MM-DD form.`);
    }
    return new DateOnly(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  readonly year: number;
  readonly month: number;
  readonly day: number;

  constructor(year: number, month: number, day: number) {
    // Date.UTC would read years 0-99 as 1900-1999.
    const probe = new Date(0);
    probe.setUTCFullYear(year, month - 1, day);
    if (
      !Number.isInteger(year) ||
      probe.getUTCFullYear() !== year ||
      probe.getUTCMonth() !== month - 1 ||
      probe.getUTCDate() !== day
    ) {
      throw new InvalidArgumentError(`${year}-${month}-${day} is not a valid calendar date.`);
    }

    this.year = year;
    this.month = month;
    this.day = day;
  }

  toString(): string {
    const pad = (n: number, width: number): string => String(n).padStart(width, '0');
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }
}

function assertValidDate(date: Date): void {
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError('Date parameter values must be valid dates.');
  }
}

/**
 * Formats a date as RFC 3339 "ATOM" (`2024-03-05T08:09:10+00:00`), in UTC and
 * without fractional seconds.
 */
export function formatAtom(date: Date): string {
  assertValidDate(date);
  return date.toISOString().replace(/\.\d{3}Z$/, '+00:00');
}

export function sanitizeValue(value: ParameterValue): SanitizedValue | undefined {
  if (value instanceof Date) return formatAtom(value);
  if (value instanceof DateOnly) return value.toString();
  if (
    value === undefined ||
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  return [...value];
}

/**
 * Sanitizes every value of a parameter map into a fresh record. Entries whose
 * value is `undefined` are dropped.
 */
export function sanitizeParameters(parameters: ParameterMap): Record<string, SanitizedValue> {
  const sanitized: Record<string, SanitizedValue> = {};
  for (const [key, value] of Object.entries(parameters)) {
    const result = sanitizeValue(value);
    if (result !== undefined) sanitized[key] = result;
  }
  return sanitized;
}

/**
 * A query value is empty when it is `undefined`, `null`, `''` or `[]`.
 * `0` and `false` are real values.
 */
export function isEmptyQueryValue(value: ParameterValue): boolean {
  if (value === undefined || value === null || value === '') return true;
  return Array.isArray(value) && value.length === 0;
}

if (import.meta.vitest) {
  const { describe, it, expect } = import.meta.vitest;

  describe('formatAtom', () => {
    it('drops milliseconds and uses a numeric UTC offset', () => {
      expect(formatAtom(new Date(Date.UTC(2024, 2, 5, 8, 9, 10, 123)))).toBe(
        '2024-03-05T08:09:10+00:00',
      );
    });

    it('rejects invalid dates', () => {
      expect(() => formatAtom(new Date('not a date'))).toThrow(InvalidArgumentError);
    });
  });

  describe('DateOnly', () => {
    it('keeps years below 100', () => {
      expect(DateOnly.parse('0050-01-01').toString()).toBe('0050-01-01');
      expect(new DateOnly(99, 12, 31).year).toBe(99);
    });

    it('rejects dates that do not exist', () => {
      expect(() => DateOnly.parse('2023-02-29')).toThrow('2023-2-29 is not a valid calendar date.');
    });
  });

  describe('isEmptyQueryValue', () => {
    it('treats zero and false as present', () => {
      expect(isEmptyQueryValue(0)).toBe(false);
      expect(isEmptyQueryValue(false)).toBe(false);
    });

    it('treats blank values as empty', () => {
      expect(isEmptyQueryValue('')).toBe(true);
      expect(isEmptyQueryValue(null)).toBe(true);
      expect(isEmptyQueryValue(undefined)).toBe(true);
      expect(isEmptyQueryValue([])).toBe(true);
    });
  });
}
