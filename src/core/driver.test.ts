import { jest } from '@jest/globals';
import { PlaywrightDriver } from './driver';

const setupPage = () => {
  const makeLocator = (text: string, children: Record<string, unknown[]> = {}) => ({
    innerText: jest.fn<() => Promise<string>>().mockResolvedValue(text),
    isVisible: jest.fn<() => Promise<boolean>>().mockResolvedValue(true),
    click: jest.fn<() => Promise<void>>().mockResolvedValue(undefined),
    locator: jest.fn((selector: string) => ({
      all: jest.fn(async () => children[selector] ?? []),
    })),
  });

  const author = makeLocator('  @someone  ');
  const thread = makeLocator('thread', { '#author-text': [author] });
  const status = jest.fn(() => 200);

  const page = {
    goto: jest.fn(async () => ({ status })),
    locator: jest.fn((selector: string) => ({
      all: jest.fn(async () => (selector === 'ytd-comment-thread-renderer' ? [thread] : [])),
    })),
    evaluate: jest.fn<(snippet: string) => Promise<void>>().mockResolvedValue(undefined),
    waitForTimeout: jest.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined),
  };
  const close = jest.fn<() => Promise<void>>().mockResolvedValue(undefined);
  const session = { page, close } as never;

  return { page, session, close, status, thread, author };
};

describe('PlaywrightDriver', () => {
  it('navigates with the configured timeout', async () => {
    const { page, session } = setupPage();
    const driver = new PlaywrightDriver(session, { navigationTimeout: 12000 });

    await driver.navigate('https://www.youtube.com/watch?v=abcEFG01234');

    expect(page.goto).toHaveBeenCalledWith('https://www.youtube.com/watch?v=abcEFG01234', {
      timeout: 12000,
      waitUntil: 'domcontentloaded',
    });
  });

  it('fails navigation on an HTTP error status', async () => {
    const { session, status } = setupPage();
    status.mockReturnValue(404);
    const driver = new PlaywrightDriver(session);

    await expect(driver.navigate('https://www.youtube.com/watch?v=abcEFG01234')).rejects.toThrow(
      'HTTP 404: Failed to load https://www.youtube.com/watch?v=abcEFG01234'
    );
  });

  it('finds page elements and scoped descendants', async () => {
    const { session, author } = setupPage();
    const driver = new PlaywrightDriver(session);

    const [thread] = await driver.findAll('ytd-comment-thread-renderer');
    const authors = await driver.findAll('#author-text', thread);

    expect(authors).toHaveLength(1);
    expect(await authors[0].text()).toBe('@someone');
    expect(author.innerText).toHaveBeenCalledWith({ timeout: 2000 });
    expect(await driver.findAll('#content-text', thread)).toEqual([]);
  });

  it('bounds text reads with the configured read timeout', async () => {
    const { session, thread } = setupPage();
    const driver = new PlaywrightDriver(session, { readTimeout: 500 });

    const [element] = await driver.findAll('ytd-comment-thread-renderer');
    expect(await element.text()).toBe('thread');

    expect(thread.innerText).toHaveBeenCalledWith({ timeout: 500 });
  });

  it('clicks through the element', async () => {
    const { session, thread } = setupPage();
    const driver = new PlaywrightDriver(session);

    const [element] = await driver.findAll('ytd-comment-thread-renderer');
    await driver.click(element);

    expect(thread.click).toHaveBeenCalledTimes(1);
  });

  it('runs scripts, pauses and quits through the page and session', async () => {
    const { page, session, close } = setupPage();
    const driver = new PlaywrightDriver(session);

    await driver.runScript('window.scrollBy(0, 800);');
    await driver.pause(2000);
    await driver.quit();

    expect(page.evaluate).toHaveBeenCalledWith('window.scrollBy(0, 800);');
    expect(page.waitForTimeout).toHaveBeenCalledWith(2000);
    expect(close).toHaveBeenCalledTimes(1);
  });
});
