import { COMMENT_FALLBACKS, VIDEO_FALLBACKS, extractComment, extractVideoInfo, getText, readText } from './fields';
import { VIDEO_SELECTORS } from './selectors';
import { FakeDriver, FakeElement, commentThread } from '../testing/fake-driver';

describe('fields', () => {
  describe('readText', () => {
    it('should return the trimmed text of the first match', async () => {
      const driver = new FakeDriver({
        elements: {
          h1: [new FakeElement({ text: '  First heading \n' }), new FakeElement({ text: 'Second' })],
        },
      });

      expect(await readText(driver, 'h1')).toBe('First heading');
    });

    it('should return undefined when nothing matches', async () => {
      expect(await readText(new FakeDriver(), 'h1')).toBeUndefined();
    });

    it('should return undefined for blank text', async () => {
      const driver = new FakeDriver({ elements: { h1: [new FakeElement({ text: '   ' })] } });
      expect(await readText(driver, 'h1')).toBeUndefined();
    });

    it('should look inside the given scope only', async () => {
      const scope = new FakeElement({ children: { span: [new FakeElement({ text: 'inside' })] } });
      const driver = new FakeDriver({ elements: { span: [new FakeElement({ text: 'outside' })] } });

      expect(await readText(driver, 'span', scope)).toBe('inside');
    });

    it('should return undefined when the element cannot be read', async () => {
      const detached = new FakeElement({ textError: new Error('locator.innerText: Timeout 2000ms exceeded') });
      const driver = new FakeDriver({ elements: { h1: [detached] } });

      expect(await readText(driver, 'h1')).toBeUndefined();
      expect(detached.textReads).toBe(1);
    });
  });

  describe('getText', () => {
    it('should apply the fallback when nothing matches', async () => {
      expect(await getText(new FakeDriver(), 'h1', 'none')).toBe('none');
    });

    it('should prefer the element text', async () => {
      const driver = new FakeDriver({ elements: { h1: [new FakeElement({ text: 'Title' })] } });
      expect(await getText(driver, 'h1', 'none')).toBe('Title');
    });
  });

  describe('extractVideoInfo', () => {
    it('should read every field', async () => {
      const driver = new FakeDriver({
        elements: {
          [VIDEO_SELECTORS.TITLE]: [new FakeElement({ text: 'Test video' })],
          [VIDEO_SELECTORS.CHANNEL]: [new FakeElement({ text: 'Test channel' })],
          [VIDEO_SELECTORS.VIEWS]: [new FakeElement({ text: '1,234 views' })],
          [VIDEO_SELECTORS.UPLOAD_DATE]: [new FakeElement({ text: 'Mar 5, 2024' })],
          [VIDEO_SELECTORS.LIKES]: [new FakeElement({ text: '56' })],
        },
      });

      const info = await extractVideoInfo(driver, 'abcEFG01234', 'https://www.youtube.com/watch?v=abcEFG01234');

      expect(info).toEqual({
        video_id: 'abcEFG01234',
        title: 'Test video',
        channel: 'Test channel',
        views: '1,234 views',
        upload_date: 'Mar 5, 2024',
        likes: '56',
        url: 'https://www.youtube.com/watch?v=abcEFG01234',
      });
    });

    it('should fall back for every missing field', async () => {
      const info = await extractVideoInfo(new FakeDriver(), 'abcEFG01234', 'u');

      expect(info).toEqual({
        video_id: 'abcEFG01234',
        title: VIDEO_FALLBACKS.TITLE,
        channel: VIDEO_FALLBACKS.CHANNEL,
        views: VIDEO_FALLBACKS.VIEWS,
        upload_date: VIDEO_FALLBACKS.UPLOAD_DATE,
        likes: VIDEO_FALLBACKS.LIKES,
        url: 'u',
      });
    });

    it('should fall back for a field whose element cannot be read', async () => {
      const driver = new FakeDriver({
        elements: {
          [VIDEO_SELECTORS.TITLE]: [
            new FakeElement({ textError: new Error('locator.innerText: Timeout 2000ms exceeded') }),
          ],
          [VIDEO_SELECTORS.CHANNEL]: [new FakeElement({ text: 'Test channel' })],
        },
      });

      const info = await extractVideoInfo(driver, 'abcEFG01234', 'u');

      expect(info.title).toBe(VIDEO_FALLBACKS.TITLE);
      expect(info.channel).toBe('Test channel');
    });
  });

  describe('extractComment', () => {
    it('should build a record from a complete thread', async () => {
      const thread = commentThread({
        author: ' @someone ',
        text: 'Nice video',
        likes: '12',
        timestamp: '2 days ago',
      });

      expect(await extractComment(new FakeDriver(), thread)).toEqual({
        author: '@someone',
        text: 'Nice video',
        likes: '12',
        timestamp: '2 days ago',
      });
    });

    it('should default likes and timestamp', async () => {
      const thread = commentThread({ author: '@someone', text: 'Nice video' });

      expect(await extractComment(new FakeDriver(), thread)).toEqual({
        author: '@someone',
        text: 'Nice video',
        likes: COMMENT_FALLBACKS.LIKES,
        timestamp: COMMENT_FALLBACKS.TIMESTAMP,
      });
    });

    it('should default likes when the count is blank', async () => {
      const thread = commentThread({ author: '@someone', text: 'Nice video', likes: ' ' });

      const comment = await extractComment(new FakeDriver(), thread);
      expect(comment?.likes).toBe('0');
    });

    it('should return null without an author', async () => {
      const thread = commentThread({ text: 'Orphan text' });
      expect(await extractComment(new FakeDriver(), thread)).toBeNull();
    });

    it('should return null without text', async () => {
      const thread = commentThread({ author: '@someone', text: '  ' });
      expect(await extractComment(new FakeDriver(), thread)).toBeNull();
    });

    it('should return null when the author cannot be read', async () => {
      const thread = commentThread({ author: new Error('Element is detached'), text: 'Nice video' });
      expect(await extractComment(new FakeDriver(), thread)).toBeNull();
    });
  });
});
