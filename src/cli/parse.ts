/**
 * Parsers shared by command-line flags and interactive answers
 */

import { InvalidInputError } from '../utils/errors.js';
import { SORT_ORDERS } from '../youtube/types.js';
import type { SortOrder } from '../youtube/types.js';
import { OUTPUT_FORMATS } from '../export/index.js';
import type { OutputFormat } from '../export/index.js';
import { BROWSER_CHOICES } from '../core/session.js';
import type { BrowserChoice } from '../core/session.js';

const MAX_TIMEOUT = 300000;

/**
 * Interactive "max comments" answer: digits only, blank or non-numeric means no limit.
 * Zero also means no limit.
 */
export function parseMaxCommentsAnswer(value: string): number | undefined {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  const parsed = parseInt(trimmed, 10);
  return parsed > 0 ? parsed : undefined;
}

/**
 * --max-comments flag: a positive integer, anything else is an input error
 */
export function parseMaxCommentsFlag(value: string): number {
  const trimmed = value.trim();
  const parsed = parseInt(trimmed, 10);
  if (!/^\d+$/.test(trimmed) || parsed < 1) {
    throw InvalidInputError.fromInvalidNumber('--max-comments', value);
  }
  return parsed;
}

export function parseTimeout(value: string): number {
  const trimmed = value.trim();
  const parsed = parseInt(trimmed, 10);

  if (!/^\d+$/.test(trimmed) || parsed < 1) {
    throw InvalidInputError.fromInvalidNumber('--timeout-ms', value);
  }

  return Math.min(parsed, MAX_TIMEOUT);
}

function parseChoice<T extends string>(
  name: string,
  value: string,
  choices: readonly T[],
  fallback: T
): T {
  const normalized = value.trim().toLowerCase();
  if (normalized === '') {
    return fallback;
  }
  const match = choices.find((choice) => choice === normalized);
  if (match === undefined) {
    throw InvalidInputError.fromInvalidChoice(name, value, choices);
  }
  return match;
}

export function parseSortOrder(value: string, fallback: SortOrder = 'top'): SortOrder {
  return parseChoice('sort order', value, SORT_ORDERS, fallback);
}

export function parseOutputFormat(value: string, fallback: OutputFormat = 'json'): OutputFormat {
  return parseChoice('output format', value, OUTPUT_FORMATS, fallback);
}

export function parseBrowser(value: string, fallback: BrowserChoice = 'edge'): BrowserChoice {
  return parseChoice('browser', value, BROWSER_CHOICES, fallback);
}
