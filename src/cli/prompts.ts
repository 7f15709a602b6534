import { createInterface } from 'readline/promises';
import {
  parseBrowser,
  parseMaxCommentsAnswer,
  parseOutputFormat,
  parseSortOrder,
} from './parse.js';
import type { Ask, PromptAnswers } from './types.js';

export const QUESTIONS = {
  URL: 'Enter YouTube video URL: ',
  MAX_COMMENTS: 'Enter maximum comments to scrape (press Enter for all): ',
  SORT: 'Sort comments by (top/newest, default: top): ',
  FORMAT: 'Output format (csv/json/both, default: json): ',
  BROWSER: 'Browser (edge/chrome, default: edge): ',
} as const;

/**
 * Ask the run questions in order. Each answer is validated before the next
 * question is asked. A blank answer takes the matching entry of defaults
 * (set from command-line flags), else the built-in default.
 */
export async function askRunQuestions(
  ask: Ask,
  defaults: Partial<Omit<PromptAnswers, 'videoUrl'>> = {}
): Promise<PromptAnswers> {
  const videoUrl = (await ask(QUESTIONS.URL)).trim();

  const maxAnswer = await ask(QUESTIONS.MAX_COMMENTS);
  const maxComments =
    maxAnswer.trim() === '' ? defaults.maxComments : parseMaxCommentsAnswer(maxAnswer);

  const sort = parseSortOrder(await ask(QUESTIONS.SORT), defaults.sort);
  const format = parseOutputFormat(await ask(QUESTIONS.FORMAT), defaults.format);
  const browser = parseBrowser(await ask(QUESTIONS.BROWSER), defaults.browser);

  return { videoUrl, maxComments, sort, format, browser };
}

/**
 * Run fn with an Ask bound to stdin/stdout, closing the terminal interface afterwards
 */
export async function withTerminalPrompt<T>(fn: (ask: Ask) => Promise<T>): Promise<T> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await fn((question) => rl.question(question));
  } finally {
    rl.close();
  }
}
