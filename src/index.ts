/**
 * mdlite - Markdown subset to HTML converter
 */

// High-level conversion API
export { convert, convertToHtml } from './converter';

// Types
export type {
  ConvertOptions,
  ConvertResult,
  ConvertMetadata,
} from './types';

// Core module re-exports
export {
  Scanner,
  tokenize,
  parseMarkdown,
  renderToHtml,
  markdownToHtml,
  escapeHtml,
  unescapeHtml,
  sanitizeHtml,
  formatToken,
} from './core/index';

export type {
  Token,
  TokenKind,
  ScanResult,
  ParserOptions,
  ParseResult,
  ParseMetadata,
} from './core/index';
