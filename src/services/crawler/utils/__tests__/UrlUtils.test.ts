import { UrlUtils } from '../UrlUtils';

describe('UrlUtils', () => {
  describe('normalize', () => {
    it('should drop the fragment', () => {
      expect(UrlUtils.normalize('https://docs.example.org/guide/intro.html#install'))
        .toBe('https://docs.example.org/guide/intro.html');
    });

    it('should keep the trailing slash of directory pages', () => {
      expect(UrlUtils.normalize('https://docs.example.org/guide/')).toBe('https://docs.example.org/guide/');
    });

    it('should return unparseable input unchanged', () => {
      expect(UrlUtils.normalize('not a url')).toBe('not a url');
    });
  });

  describe('resolveUrl', () => {
    it('should resolve relative links against the page URL', () => {
      expect(UrlUtils.resolveUrl('../api/index.html', 'https://docs.example.org/lib/guide/intro.html'))
        .toBe('https://docs.example.org/lib/api/index.html');
    });

    it('should return null when the base is not a URL', () => {
      expect(UrlUtils.resolveUrl('page.html', 'not-a-base')).toBeNull();
    });
  });

  describe('getRootUrl', () => {
    it('should keep the port', () => {
      expect(UrlUtils.getRootUrl('http://localhost:8080/docs/index.html')).toBe('http://localhost:8080');
    });

    it('should strip path and query', () => {
      expect(UrlUtils.getRootUrl('https://docs.example.org/lib/?q=1')).toBe('https://docs.example.org');
    });
  });

  describe('firstPathSegment', () => {
    it('should return the library segment', () => {
      expect(UrlUtils.firstPathSegment('https://docs.example.org/polars/user-guide/')).toBe('polars');
    });

    it('should return an empty string for the site root', () => {
      expect(UrlUtils.firstPathSegment('https://docs.example.org/')).toBe('');
    });
  });

  describe('toFileStem', () => {
    it('should drop the first segment and join the rest', () => {
      expect(UrlUtils.toFileStem('https://docs.example.org/polars/user-guide/intro.html'))
        .toBe('user-guide_intro.html');
    });

    it('should default to index when nothing is left', () => {
      expect(UrlUtils.toFileStem('https://docs.example.org/polars/')).toBe('index');
      expect(UrlUtils.toFileStem('https://docs.example.org/')).toBe('index');
    });

    it('should replace characters that are unsafe in file names', () => {
      expect(UrlUtils.toFileStem('https://docs.example.org/lib/a b/c.html')).toBe('a-20b_c.html');
    });
  });
});
