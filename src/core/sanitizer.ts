/**
 * URL sanitizer for rendered HTML.
 *
 * The renderer escapes every payload, so no markup can be injected through
 * token text. What can still get through is a script-capable URL in a link
 * `href` or image `src`. This pass empties such attributes and leaves the
 * rest of the HTML untouched.
 */

import { unescapeHtml } from './escape.js';

// ---------------------------------------------------------------------------
// Pre-compiled patterns
// ---------------------------------------------------------------------------

/** Double-quoted href/src attribute, as emitted by the renderer. */
const URL_ATTR_RE = /\b(href|src)="([^"]*)"/gi;

/** Schemes that execute or embed content instead of navigating. */
const DANGEROUS_SCHEME_RE = /^(?:javascript|vbscript|data):/i;

/** Browsers ignore control characters and spaces inside a scheme. */
const IGNORED_URL_CHARS_RE = /[\x00-\x20]+/g;

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Whether an attribute value, as written in the HTML, resolves to a
 * `javascript:`, `vbscript:` or `data:` URL.
 */
export function isDangerousUrl(value: string): boolean {
  const decoded = unescapeHtml(value).replace(IGNORED_URL_CHARS_RE, '');
  return DANGEROUS_SCHEME_RE.test(decoded);
}

/**
 * Neutralise dangerous URLs in rendered HTML.
 *
 * 1. Strips NUL bytes.
 * 2. Replaces the value of every `href`/`src` attribute whose URL uses a
 *    dangerous scheme with the empty string.
 *
 * @param html - HTML produced by the renderer.
 * @returns Sanitized HTML string.
 *
 * @example
 * ```ts
 * sanitizeHtml('<a href="javascript:alert(1)">x</a>');
 * // => '<a href="">x</a>'
 * ```
 */
export function sanitizeHtml(html: string): string {
  // Early exit: plain text with no HTML tags needs no sanitization.
  if (!html.includes('<')) return html;

  const result = html.replace(/\x00/g, '');

  URL_ATTR_RE.lastIndex = 0;
  return result.replace(URL_ATTR_RE, (match, attr: string, value: string) =>
    isDangerousUrl(value) ? `${attr}=""` : match,
  );
}
