/**
 * Command-line helpers for the ops scripts
 */

import { createInterface } from 'node:readline/promises';
import { parseArgs } from 'node:util';
import { normalizeMonth, parseYear, type MonthName } from '../documents/month';
import { InvalidInputError } from '../errors/newsletter-errors';

export interface CreateNewsletterArgs {
  month?: MonthName;
  year?: number;
  dryRun: boolean;
}

export interface CreateCampaignArgs {
  month?: MonthName;
  link?: string;
}

export function parseCreateNewsletterArgs(argv: string[]): CreateNewsletterArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      year: { type: 'string', short: 'y' },
      'dry-run': { type: 'boolean', default: false },
    },
  });

  if (positionals.length > 1) {
    throw new InvalidInputError(`Expected a single month argument, got: ${positionals.join(' ')}`);
  }

  return {
    month: positionals[0] ? normalizeMonth(positionals[0]) : undefined,
    year: values.year ? parseYear(values.year) : undefined,
    dryRun: values['dry-run'] ?? false,
  };
}

export function parseCreateCampaignArgs(argv: string[]): CreateCampaignArgs {
  const { positionals } = parseArgs({ args: argv, allowPositionals: true, options: {} });

  if (positionals.length > 2) {
    throw new InvalidInputError('Usage: newsletter:campaign <month> <link>');
  }

  const [month, link] = positionals;
  return {
    month: month ? normalizeMonth(month) : undefined,
    link: link ? parseLink(link) : undefined,
  };
}

export function parseLink(input: string): string {
  const value = input.trim();
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new InvalidInputError(`Invalid link: "${value}"`);
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new InvalidInputError(`Invalid link: "${value}"`);
  }
  // Serialized form percent-encodes quotes and angle brackets for the href attribute
  return url.href;
}

/** Ask one question on the terminal; an empty answer is an error. */
export async function prompt(question: string, label: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = (await rl.question(question)).trim();
    if (!answer) {
      throw new InvalidInputError(`${label} is required`);
    }
    return answer;
  } finally {
    rl.close();
  }
}

export async function resolveMonth(month: MonthName | undefined): Promise<MonthName> {
  if (month) return month;
  return normalizeMonth(await prompt("Enter newsletter month (e.g. 'November'): ", 'Month'));
}
