/**
 * Markdown parser module.
 *
 * Drains a {@link Scanner} into an ordered token sequence and extracts
 * document-level metadata (headings, lists, links, images) in the same pass.
 *
 * @module core/parser
 */
import { Scanner } from './scanner.js';
import type { ParserOptions, ParseResult, ParseMetadata, Token } from './types.js';

function emptyMetadata(): ParseMetadata {
  return {
    headingCount: 0,
    hasLists: false,
    hasLinks: false,
    hasImages: false,
  };
}

/**
 * Fold a single token into the running metadata.
 */
function recordToken(metadata: ParseMetadata, token: Token): void {
  switch (token.kind) {
    case 'heading':
      metadata.headingCount++;
      break;
    case 'listItem':
      metadata.hasLists = true;
      break;
    case 'link':
      metadata.hasLinks = true;
      break;
    case 'image':
      metadata.hasImages = true;
      break;
    default:
      break;
  }
}

/**
 * Parse a Markdown string into a token sequence with metadata.
 *
 * @param markdown - The Markdown source to parse. Non-string values are
 *   treated as the empty string and produce an empty token list.
 * @param options  - Optional parser configuration.
 * @returns A {@link ParseResult} containing the tokens and extracted
 *   metadata.
 *
 * @example
 * ```ts
 * const result = parseMarkdown('# Hello\n\nWorld');
 * console.log(result.tokens[0].kind); // 'heading'
 * ```
 */
export function parseMarkdown(
  markdown: string,
  options?: ParserOptions,
): ParseResult {
  // Callers from plain JavaScript may pass null or undefined.
  const source: string =
    typeof markdown === 'string' ? markdown : '';

  const scanner = new Scanner(source);
  const tokens: Token[] = [];
  const metadata = emptyMetadata();

  for (;;) {
    const token = scanner.next();
    if (token.kind === 'endOfStream') {
      break;
    }
    tokens.push(token);
    recordToken(metadata, token);
    options?.onToken?.(token);
  }

  return { tokens, metadata };
}
