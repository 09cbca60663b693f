import { parseMarkdown } from '../../src/core/parser';
import type { Token } from '../../src/core/types';

describe('parseMarkdown', () => {
  // ---------------------------------------------------------------------------
  // Edge cases: empty / falsy inputs
  // ---------------------------------------------------------------------------

  describe('edge cases', () => {
    it('should return empty result for an empty string', () => {
      const result = parseMarkdown('');
      expect(result.tokens).toEqual([]);
      expect(result.metadata).toEqual({
        headingCount: 0,
        hasLists: false,
        hasLinks: false,
        hasImages: false,
      });
    });

    it('should return no tokens for newline-only input', () => {
      expect(parseMarkdown('\n\n\n').tokens).toEqual([]);
    });

    it('should return no tokens for null input', () => {
      // TypeScript would flag this, but at runtime someone might pass null
      const result = parseMarkdown(null as unknown as string);
      expect(result.tokens).toEqual([]);
      expect(result.metadata.headingCount).toBe(0);
    });

    it('should return no tokens for undefined input', () => {
      const result = parseMarkdown(undefined as unknown as string);
      expect(result.tokens).toEqual([]);
    });
  });

  // ---------------------------------------------------------------------------
  // Metadata
  // ---------------------------------------------------------------------------

  describe('metadata', () => {
    it('should collect every flag from a mixed document', () => {
      const result = parseMarkdown('# A\n## B\n- x\n[l](u) ![i](s)');
      expect(result.tokens).toEqual([
        { kind: 'heading', level: 1, text: 'A' },
        { kind: 'heading', level: 2, text: 'B' },
        { kind: 'listItem', text: 'x' },
        { kind: 'link', text: 'l', href: 'u' },
        { kind: 'text', text: ' ' },
        { kind: 'image', alt: 'i', src: 's' },
      ]);
      expect(result.metadata).toEqual({
        headingCount: 2,
        hasLists: true,
        hasLinks: true,
        hasImages: true,
      });
    });

    it('should not count failed constructs', () => {
      const result = parseMarkdown('#nope\n-nope\n[nope](x');
      expect(result.tokens.every((t) => t.kind === 'text')).toBe(true);
      expect(result.metadata).toEqual({
        headingCount: 0,
        hasLists: false,
        hasLinks: false,
        hasImages: false,
      });
    });

    it('should not treat an image as a link', () => {
      const result = parseMarkdown('![logo](logo.png)');
      expect(result.metadata.hasImages).toBe(true);
      expect(result.metadata.hasLinks).toBe(false);
    });
  });

  // ---------------------------------------------------------------------------
  // onToken
  // ---------------------------------------------------------------------------

  describe('onToken', () => {
    it('should report every token in scan order', () => {
      const seen: Token[] = [];
      const result = parseMarkdown('**a** b', { onToken: (t) => seen.push(t) });
      expect(seen).toEqual([
        { kind: 'bold', text: 'a' },
        { kind: 'text', text: ' b' },
      ]);
      expect(seen).toEqual(result.tokens);
    });

    it('should not be called for empty input', () => {
      const onToken = jest.fn();
      parseMarkdown('', { onToken });
      expect(onToken).not.toHaveBeenCalled();
    });
  });
});
