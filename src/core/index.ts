/**
 * Core module barrel exports.
 *
 * Re-exports all public APIs from the scanner, parser, renderer, sanitizer,
 * and type definition modules.
 *
 * @module core
 */

// Scanner
export { Scanner, tokenize } from './scanner.js';

// Parser
export { parseMarkdown } from './parser.js';

// Renderer
export { renderToHtml, markdownToHtml, tokenToHtml, isBlockToken } from './renderer.js';

// Escaping
export { escapeHtml, unescapeHtml } from './escape.js';

// Sanitizer
export { sanitizeHtml, isDangerousUrl } from './sanitizer.js';

// Preprocessor
export { preprocessMarkdown } from './preprocessor.js';

// Debug helpers
export { formatToken, tokenKindName } from './inspect.js';

// Types
export type {
  Token,
  TokenKind,
  ScanResult,
  HeadingLevel,
  TextToken,
  HeadingToken,
  BoldToken,
  ItalicToken,
  LinkToken,
  ImageToken,
  ListItemToken,
  EndOfStreamToken,
  BlockToken,
  InlineToken,
  ParserOptions,
  ParseResult,
  ParseMetadata,
} from './types.js';
