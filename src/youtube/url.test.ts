import { buildWatchUrl, extractVideoId } from './url';

const ID = 'abcEFG01234';

describe('extractVideoId', () => {
  describe('short links', () => {
    it('should take the last path segment', () => {
      expect(extractVideoId(`https://youtu.be/${ID}`)).toBe(ID);
    });

    it('should strip the query string', () => {
      expect(extractVideoId(`https://youtu.be/${ID}?si=share-token&t=10`)).toBe(ID);
    });

    it('should return null when the path is empty', () => {
      expect(extractVideoId('https://youtu.be/')).toBeNull();
    });
  });

  describe('watch URLs', () => {
    it('should read the v parameter', () => {
      expect(extractVideoId(`https://www.youtube.com/watch?v=${ID}`)).toBe(ID);
    });

    it('should read v when it is not the first parameter', () => {
      expect(extractVideoId(`https://www.youtube.com/watch?feature=share&v=${ID}&t=42s`)).toBe(ID);
    });

    it('should accept a URL without scheme', () => {
      expect(extractVideoId(`youtube.com/watch?v=${ID}`)).toBe(ID);
    });

    it('should ignore a fragment after the query', () => {
      expect(extractVideoId(`https://m.youtube.com/watch?v=${ID}#comments`)).toBe(ID);
    });

    it('should return null without a v parameter', () => {
      expect(extractVideoId('https://www.youtube.com/watch?list=PL123')).toBeNull();
    });

    it('should return null for an empty v parameter', () => {
      expect(extractVideoId('https://www.youtube.com/watch?v=')).toBeNull();
    });

    it('should return null without a query string', () => {
      expect(extractVideoId('https://www.youtube.com/watch')).toBeNull();
    });
  });

  describe('shorts and embed URLs', () => {
    it('should extract from shorts', () => {
      expect(extractVideoId(`https://www.youtube.com/shorts/${ID}?feature=share`)).toBe(ID);
    });

    it('should extract from embed', () => {
      expect(extractVideoId(`https://www.youtube.com/embed/${ID}`)).toBe(ID);
    });
  });

  describe('bare ids', () => {
    it('should accept an 11-character id', () => {
      expect(extractVideoId(ID)).toBe(ID);
    });

    it('should accept hyphens and underscores', () => {
      expect(extractVideoId('a-b_c-d_e-f')).toBe('a-b_c-d_e-f');
    });

    it('should reject 10 characters', () => {
      expect(extractVideoId('abcEFG0123')).toBeNull();
    });

    it('should reject 12 characters', () => {
      expect(extractVideoId('abcEFG012345')).toBeNull();
    });

    it('should reject other characters', () => {
      expect(extractVideoId('abcEFG0123!')).toBeNull();
    });
  });

  describe('unrecognized input', () => {
    it('should return null for another site', () => {
      expect(extractVideoId('https://example.com/watch/abcEFG01234')).toBeNull();
    });

    it('should return null for an empty string', () => {
      expect(extractVideoId('')).toBeNull();
    });

    it('should return null for a channel URL', () => {
      expect(extractVideoId('https://www.youtube.com/@somechannel')).toBeNull();
    });
  });
});

describe('buildWatchUrl', () => {
  it('should build the canonical watch URL', () => {
    expect(buildWatchUrl(ID)).toBe(`https://www.youtube.com/watch?v=${ID}`);
  });
});
