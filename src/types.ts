import type { Token } from './core/types';

/**
 * Options for the full markdown to HTML pipeline
 */
export interface ConvertOptions {
  /** Source markdown string */
  markdown: string;
  /** Document title; taken from the first `#` or `##` heading when omitted */
  title?: string;
  /**
   * Neutralise `javascript:`, `vbscript:` and `data:` URLs in links and images.
   * @default true
   */
  sanitize?: boolean;
  /**
   * Log every scanned token and a summary line via `console.debug`.
   * @default false
   */
  debug?: boolean;
}

/**
 * Metadata about the converted document.
 */
export interface ConvertMetadata {
  /** Document title (from options, else first level-1/2 heading, else "Untitled") */
  title: string;
  /** Approximate word count of the rendered plain text */
  wordCount: number;
  /** Number of headings of any level */
  headingCount: number;
  /** Whether the document contains list items */
  hasLists: boolean;
  /** Whether the document contains links */
  hasLinks: boolean;
  /** Whether the document contains images */
  hasImages: boolean;
}

/**
 * Result of the HTML conversion pipeline.
 *
 * Contains the HTML fragment, a plain-text fallback, the token sequence it
 * was rendered from, and document-level metadata.
 */
export interface ConvertResult {
  /** HTML fragment */
  html: string;
  /** Plain text version with tags removed and entities decoded */
  plainText: string;
  /** Scanned tokens, in document order */
  tokens: Token[];
  /** Document metadata */
  metadata: ConvertMetadata;
}
