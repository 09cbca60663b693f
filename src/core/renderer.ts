/**
 * HTML renderer for scanned Markdown tokens.
 *
 * A single left-to-right pass over the token sequence. Block tokens
 * (headings, list items) stand on their own; inline tokens are gathered
 * into paragraphs. Consecutive list items share one `<ul>` wrapper.
 *
 * Every payload, URLs included, goes through {@link escapeHtml}; no
 * URL-specific encoding is applied.
 */

import { escapeHtml } from './escape.js';
import { tokenize } from './scanner.js';
import type { BlockToken, Token } from './types.js';

// ---------------------------------------------------------------------------
// Token classification
// ---------------------------------------------------------------------------

/** Whether a token renders as a standalone container. */
export function isBlockToken(token: Token): token is BlockToken {
  return token.kind === 'heading' || token.kind === 'listItem';
}

// ---------------------------------------------------------------------------
// Fragments
// ---------------------------------------------------------------------------

/**
 * Render the HTML fragment for a single token, without any paragraph or
 * list wrapper. Block fragments end with a newline; inline fragments do not.
 */
export function tokenToHtml(token: Token): string {
  switch (token.kind) {
    case 'text':
      return escapeHtml(token.text);
    case 'heading':
      return `<h${token.level}>${escapeHtml(token.text)}</h${token.level}>\n`;
    case 'bold':
      return `<strong>${escapeHtml(token.text)}</strong>`;
    case 'italic':
      return `<em>${escapeHtml(token.text)}</em>`;
    case 'link':
      return `<a href="${escapeHtml(token.href)}">${escapeHtml(token.text)}</a>`;
    case 'image':
      return `<img src="${escapeHtml(token.src)}" alt="${escapeHtml(token.alt)}">`;
    case 'listItem':
      return `<li>${escapeHtml(token.text)}</li>\n`;
    default: {
      const unreachable: never = token;
      return unreachable;
    }
  }
}

// ---------------------------------------------------------------------------
// Document rendering
// ---------------------------------------------------------------------------

/**
 * Render a token sequence into an HTML fragment.
 *
 * Wrappers are balanced: every `<p>` and `<ul>` opened here is closed here.
 *
 * @param tokens - Token sequence produced by {@link tokenize} or
 *   `parseMarkdown()`.
 * @returns HTML fragment (no `<html>`/`<body>` wrapper).
 *
 * @example
 * ```ts
 * renderToHtml([{ kind: 'listItem', text: 'One' }]);
 * // => '<ul>\n<li>One</li>\n</ul>\n'
 * ```
 */
export function renderToHtml(tokens: readonly Token[]): string {
  let html = '';
  let inList = false;
  let inParagraph = false;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const isBlock = isBlockToken(token);

    // List wrapping
    if (token.kind === 'listItem') {
      if (inParagraph) {
        html += '</p>\n';
        inParagraph = false;
      }
      if (!inList) {
        html += '<ul>\n';
        inList = true;
      }
    } else if (inList) {
      html += '</ul>\n';
      inList = false;
    }

    // Paragraph wrapping
    if (!isBlock && !inParagraph) {
      html += '<p>';
      inParagraph = true;
    } else if (isBlock && inParagraph) {
      html += '</p>\n';
      inParagraph = false;
    }

    html += tokenToHtml(token);

    const isLast = i === tokens.length - 1;
    if (inParagraph && (isLast || isBlockToken(tokens[i + 1]))) {
      html += '</p>\n';
      inParagraph = false;
    }
  }

  if (inList) html += '</ul>\n';
  if (inParagraph) html += '</p>\n';

  return html;
}

/**
 * Convert raw Markdown to HTML in a single call.
 *
 * This is a convenience wrapper around {@link tokenize} +
 * {@link renderToHtml}.
 *
 * @example
 * ```ts
 * markdownToHtml('# Hello');
 * // => '<h1>Hello</h1>\n'
 * ```
 */
export function markdownToHtml(markdown: string): string {
  return renderToHtml(tokenize(markdown));
}
