/**
 * Browser automation surface used by the scraper
 * Everything under youtube/ talks to the page only through these interfaces.
 */

import type { Locator, Page } from 'playwright';
import type { BrowserSession } from './session.js';

export interface ElementRef {
  /** Trimmed visible text */
  text(): Promise<string>;
  isVisible(): Promise<boolean>;
  /** Descendants matching selector, in DOM order */
  query(selector: string): Promise<ElementRef[]>;
  click(): Promise<void>;
}

export interface BrowserDriver {
  navigate(url: string): Promise<void>;
  /** Elements matching selector within scope (whole page when omitted), in DOM order */
  findAll(selector: string, scope?: ElementRef): Promise<ElementRef[]>;
  click(element: ElementRef): Promise<void>;
  runScript(snippet: string): Promise<void>;
  pause(ms: number): Promise<void>;
  /** Release the browser. Safe to call more than once. */
  quit(): Promise<void>;
}

class LocatorElement implements ElementRef {
  constructor(
    private readonly locator: Locator,
    private readonly readTimeout: number
  ) {}

  async text(): Promise<string> {
    return (await this.locator.innerText({ timeout: this.readTimeout })).trim();
  }

  async isVisible(): Promise<boolean> {
    return this.locator.isVisible();
  }

  async query(selector: string): Promise<ElementRef[]> {
    const matches = await this.locator.locator(selector).all();
    return matches.map((match) => new LocatorElement(match, this.readTimeout));
  }

  async click(): Promise<void> {
    await this.locator.click();
  }
}

export interface PlaywrightDriverOptions {
  /**
   * Navigation timeout (ms)
   * @default 30000
   */
  navigationTimeout?: number;

  /**
   * Timeout for reading an element's text (ms). An element that left the
   * page fails after this instead of the context's default timeout.
   * @default 2000
   */
  readTimeout?: number;
}

export class PlaywrightDriver implements BrowserDriver {
  private readonly page: Page;
  private readonly navigationTimeout: number;
  private readonly readTimeout: number;

  constructor(
    private readonly session: BrowserSession,
    options: PlaywrightDriverOptions = {}
  ) {
    this.page = session.page;
    this.navigationTimeout = options.navigationTimeout ?? 30000;
    this.readTimeout = options.readTimeout ?? 2000;
  }

  async navigate(url: string): Promise<void> {
    const response = await this.page.goto(url, {
      timeout: this.navigationTimeout,
      waitUntil: 'domcontentloaded',
    });

    if (response && response.status() >= 400) {
      throw new Error(`HTTP ${response.status()}: Failed to load ${url}`);
    }
  }

  async findAll(selector: string, scope?: ElementRef): Promise<ElementRef[]> {
    if (scope) {
      return scope.query(selector);
    }
    const matches = await this.page.locator(selector).all();
    return matches.map((match) => new LocatorElement(match, this.readTimeout));
  }

  async click(element: ElementRef): Promise<void> {
    await element.click();
  }

  async runScript(snippet: string): Promise<void> {
    await this.page.evaluate(snippet);
  }

  async pause(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async quit(): Promise<void> {
    await this.session.close();
  }
}
