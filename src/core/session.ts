import { chromium } from 'playwright';
import type { Browser, BrowserContext, BrowserType, Page } from 'playwright';
import { getLogger } from '../utils/logger.js';
import { BrowserLaunchError } from '../utils/errors.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export type BrowserChoice = 'edge' | 'chrome';

export const BROWSER_CHOICES: readonly BrowserChoice[] = ['edge', 'chrome'];

const CHANNELS: Record<BrowserChoice, string> = {
  edge: 'msedge',
  chrome: 'chrome',
};

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-blink-features=AutomationControlled',
  '--start-maximized',
  '--disable-notifications',
  '--mute-audio',
];

// Runs before any page script on every navigation.
export const HIDE_WEBDRIVER_SCRIPT =
  "Object.defineProperty(navigator, 'webdriver', { get: () => undefined })";

export interface BrowserSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
  close: () => Promise<void>;
}

export interface BrowserSessionOptions {
  /** @default 'edge' */
  browser?: BrowserChoice;
  /** @default true */
  headless?: boolean;
  userAgent?: string;
  /**
   * Default timeout for element lookups and actions (ms)
   * @default 15000
   */
  timeoutMs?: number;
  /** Browser type used to launch, defaults to Playwright's chromium */
  launcher?: Pick<BrowserType, 'launch'>;
}

export async function createBrowserSession(
  options: BrowserSessionOptions = {}
): Promise<BrowserSession> {
  const logger = getLogger();
  const choice = options.browser ?? 'edge';
  const headless = options.headless ?? true;
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  const timeoutMs = options.timeoutMs ?? 15000;
  const launcher = options.launcher ?? chromium;

  let browser: Browser | null = null;
  let context: BrowserContext | null = null;
  let page: Page | null = null;
  let closed = false;

  const closeQuietly = async (name: string, fn: () => Promise<void>) => {
    try {
      await fn();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug(`Ignoring ${name} close failure: ${message}`);
    }
  };

  const close = async () => {
    if (closed) return;
    closed = true;

    const openPage = page;
    const openContext = context;
    const openBrowser = browser;

    if (openPage) {
      await closeQuietly('page', () => openPage.close());
    }
    if (openContext) {
      await closeQuietly('context', () => openContext.close());
    }
    if (openBrowser) {
      await closeQuietly('browser', () => openBrowser.close());
    }
  };

  try {
    browser = await launcher.launch({
      headless,
      channel: CHANNELS[choice],
      args: LAUNCH_ARGS,
    });
    context = await browser.newContext({ userAgent, viewport: null });
    context.setDefaultTimeout(timeoutMs);
    await context.addInitScript(HIDE_WEBDRIVER_SCRIPT);
    page = await context.newPage();

    logger.info(`Started ${choice === 'edge' ? 'Edge' : 'Chrome'} browser`);

    return {
      browser,
      context,
      page,
      close,
    };
  } catch (error) {
    await close();
    const message = error instanceof Error ? error.message : String(error);
    throw BrowserLaunchError.fromLaunchFailure(choice, message);
  }
}
