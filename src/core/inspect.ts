/**
 * Human-readable token descriptions for debug output.
 *
 * @module core/inspect
 */
import type { ScanResult } from './types.js';

/**
 * Stable upper-case name for a token: `TEXT`, `H1`..`H6`, `BOLD`, `ITALIC`,
 * `LINK`, `IMAGE`, `LIST`, or `EOF` for the end-of-stream marker.
 */
export function tokenKindName(token: ScanResult): string {
  switch (token.kind) {
    case 'text':
      return 'TEXT';
    case 'heading':
      return `H${token.level}`;
    case 'bold':
      return 'BOLD';
    case 'italic':
      return 'ITALIC';
    case 'link':
      return 'LINK';
    case 'image':
      return 'IMAGE';
    case 'listItem':
      return 'LIST';
    case 'endOfStream':
      return 'EOF';
  }
}

/**
 * One-line description such as `H2("Setup")` or
 * `LINK("Docs|https://example.com")`.
 */
export function formatToken(token: ScanResult): string {
  switch (token.kind) {
    case 'endOfStream':
      return 'EOF';
    case 'link':
      return `LINK(${JSON.stringify(`${token.text}|${token.href}`)})`;
    case 'image':
      return `IMAGE(${JSON.stringify(`${token.alt}|${token.src}`)})`;
    default:
      return `${tokenKindName(token)}(${JSON.stringify(token.text)})`;
  }
}
