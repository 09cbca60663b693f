/**
 * Scanner termination and whole-pipeline edge cases.
 */
import { Scanner, tokenize } from '../../src/core/scanner';
import { markdownToHtml } from '../../src/core/renderer';

/** Characters that drive every branch of the scanner. */
const ALPHABET = ['#', '*', '[', ']', '(', ')', '!', '-', ' ', '\n', 'a', '\\'];

/** Every string of exactly `length` characters drawn from {@link ALPHABET}. */
function allStrings(length: number): string[] {
  let result = [''];
  for (let i = 0; i < length; i++) {
    result = result.flatMap((prefix) => ALPHABET.map((ch) => prefix + ch));
  }
  return result;
}

describe('Edge cases - scanner termination', () => {
  it('advances the cursor on every token for all short inputs', () => {
    const stalled: string[] = [];

    for (const input of allStrings(3)) {
      const scanner = new Scanner(input);
      let previous = -1;
      for (;;) {
        const token = scanner.next();
        if (token.kind === 'endOfStream') break;
        if (scanner.position <= previous || scanner.position > input.length) {
          stalled.push(input);
          break;
        }
        previous = scanner.position;
      }
      if (scanner.position !== input.length) {
        stalled.push(input);
      }
    }

    expect(stalled).toEqual([]);
  });

  it('never produces more tokens than input characters', () => {
    const input = '*[!-#'.repeat(200);
    expect(tokenize(input).length).toBeLessThanOrEqual(input.length);
  });

  it('handles long runs of a single trigger character', () => {
    expect(tokenize('*'.repeat(8))).toEqual([
      { kind: 'bold', text: '' },
      { kind: 'bold', text: '' },
    ]);
    expect(tokenize('['.repeat(1000))).toEqual([{ kind: 'text', text: '['.repeat(1000) }]);
  });
});

describe('Edge cases - full pipeline', () => {
  it('renders a trigger-only line as literal text', () => {
    expect(markdownToHtml('!!')).toBe('<p>!!</p>\n');
  });

  it('keeps a hyphenated word on one paragraph line', () => {
    expect(markdownToHtml('well-known fact')).toBe('<p>well-known fact</p>\n');
  });

  it('escapes markup inside a failed construct', () => {
    expect(markdownToHtml('[<script>')).toBe('<p>[&lt;script&gt;</p>\n');
  });

  it('renders a heading with escaped content', () => {
    expect(markdownToHtml('# Fish & "Chips"')).toBe('<h1>Fish &amp; &quot;Chips&quot;</h1>\n');
  });
});
