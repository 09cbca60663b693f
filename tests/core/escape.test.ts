import { escapeHtml, unescapeHtml } from '../../src/core/escape';

describe('escapeHtml', () => {
  it('escapes the four special characters', () => {
    expect(escapeHtml('<a href="x">&</a>')).toBe(
      '&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;',
    );
  });

  it('leaves single quotes and other text alone', () => {
    expect(escapeHtml("it's fine")).toBe("it's fine");
  });
});

describe('unescapeHtml', () => {
  it('decodes the four entities', () => {
    expect(unescapeHtml('&lt;&gt;&amp;&quot;')).toBe('<>&"');
  });

  it('decodes in a single pass', () => {
    expect(unescapeHtml('&amp;lt;')).toBe('&lt;');
  });

  it('leaves other entities untouched', () => {
    expect(unescapeHtml('&#39;&nbsp;')).toBe('&#39;&nbsp;');
  });

  it.each(['a < b', '&amp;', 'say "hi" & <bye>', '&&;;', ''])(
    'inverts escapeHtml for %j',
    (text) => {
      expect(unescapeHtml(escapeHtml(text))).toBe(text);
    },
  );
});
