import { InvalidInputError } from '../errors/newsletter-errors';

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

export type MonthName = (typeof MONTH_NAMES)[number];

/** Accepts "November", "november", "NOV" etc. and returns the canonical name. */
export function normalizeMonth(input: string): MonthName {
  const value = input.trim().toLowerCase();

  const match = MONTH_NAMES.find(
    (name) => name.toLowerCase() === value || (value.length === 3 && name.toLowerCase().startsWith(value))
  );

  if (!match) {
    throw new InvalidInputError(`Unknown month: "${input.trim()}". Use a month name such as "November".`);
  }
  return match;
}

export function parseYear(input: string | number): number {
  const year = typeof input === 'number' ? input : Number(input.trim());
  if (!Number.isInteger(year) || year < 2000 || year > 2100) {
    throw new InvalidInputError(`Invalid year: "${input}"`);
  }
  return year;
}

/** "<Month> <Year>", the title used for the CMS record */
export function issueTitle(month: MonthName, year: number): string {
  return `${month} ${year}`;
}
