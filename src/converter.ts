import type { ConvertOptions, ConvertResult } from './types';
import type { Token } from './core/types';
import { parseMarkdown } from './core/parser';
import { renderToHtml } from './core/renderer';
import { sanitizeHtml } from './core/sanitizer';
import { preprocessMarkdown } from './core/preprocessor';
import { unescapeHtml } from './core/escape';
import { formatToken } from './core/inspect';

const LOG_PREFIX = '[mdlite]';

/**
 * Strip HTML tags from a string to produce plain text.
 *
 * @param html - HTML string to strip.
 * @returns Plain text with tags removed, entities decoded and runs of blank
 *   lines collapsed.
 */
function stripHtmlTags(html: string): string {
  return unescapeHtml(html.replace(/<[^>]*>/g, ''))
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Count words in a plain text string.
 *
 * Latin/ASCII words are split on whitespace; each CJK character counts as
 * one word.
 *
 * @param text - Plain text string.
 * @returns Approximate word count.
 */
function countWords(text: string): number {
  if (!text.trim()) {
    return 0;
  }

  // CJK Unified Ideographs, Hiragana, Katakana, compatibility ideographs.
  const cjkRegex = /[\u3000-\u9fff\uf900-\ufaff\u{20000}-\u{2fa1f}]/gu;
  const cjkCount = text.match(cjkRegex)?.length ?? 0;

  const latinWords = text
    .replace(cjkRegex, ' ')
    .split(/\s+/)
    .filter((w) => w.length > 0);

  return latinWords.length + cjkCount;
}

/**
 * Take the text of the first level-1 or level-2 heading.
 *
 * @param tokens - Scanned tokens.
 * @returns The trimmed heading text, or `undefined` if there is none.
 */
function extractTitle(tokens: readonly Token[]): string | undefined {
  for (const token of tokens) {
    if (token.kind === 'heading' && token.level <= 2 && token.text.trim()) {
      return token.text.trim();
    }
  }
  return undefined;
}

/**
 * Convert markdown to an HTML fragment.
 *
 * Scans the whole input, then renders the token sequence. No preprocessing
 * or sanitizing is applied; see {@link convertToHtml} for the full pipeline.
 *
 * @example
 * ```ts
 * convert('- Item 1\n- Item 2');
 * // => '<ul>\n<li>Item 1</li>\n<li>Item 2</li>\n</ul>\n'
 * ```
 */
export function convert(markdown: string): string {
  return renderToHtml(parseMarkdown(markdown).tokens);
}

/**
 * Convert markdown to HTML with a plain-text fallback and metadata.
 *
 * Runs the full pipeline:
 * 1. Preprocess (strip byte-order mark, normalise line endings)
 * 2. Scan into tokens
 * 3. Render tokens to HTML
 * 4. Sanitize link and image URLs (unless `sanitize: false`)
 * 5. Generate plain-text fallback
 * 6. Collect document metadata
 *
 * @param options - Conversion options (markdown source and optional title).
 * @returns A {@link ConvertResult} with the HTML, plain text, tokens and
 *   metadata.
 *
 * @example
 * ```ts
 * const result = convertToHtml({ markdown: '# Hello\n\nWorld' });
 * console.log(result.html);      // '<h1>Hello</h1>\n<p>World</p>\n'
 * console.log(result.plainText); // 'Hello\nWorld'
 * ```
 */
export function convertToHtml(options: ConvertOptions): ConvertResult {
  const { markdown, title, sanitize = true, debug = false } = options;

  // Step 0: Preprocess
  const source = preprocessMarkdown(typeof markdown === 'string' ? markdown : '');

  // Step 1: Parse
  const parseResult = parseMarkdown(source, {
    onToken: debug
      ? (token) => console.debug(LOG_PREFIX, formatToken(token))
      : undefined,
  });

  // Step 2: Render
  const rawHtml = renderToHtml(parseResult.tokens);

  // Step 3: Sanitize
  const html = sanitize ? sanitizeHtml(rawHtml) : rawHtml;

  // Step 4: Plain text
  const plainText = stripHtmlTags(html);

  // Step 5: Metadata
  const resolvedTitle = title ?? extractTitle(parseResult.tokens) ?? 'Untitled';
  const wordCount = countWords(plainText);

  if (debug) {
    console.debug(
      LOG_PREFIX,
      `${parseResult.tokens.length} tokens, ${html.length} chars of HTML`,
    );
  }

  return {
    html,
    plainText,
    tokens: parseResult.tokens,
    metadata: {
      title: resolvedTitle,
      wordCount,
      ...parseResult.metadata,
    },
  };
}
