/**
 * HTML entity escaping for token payloads.
 *
 * Only the four characters that can break out of element content or a
 * double-quoted attribute are touched.
 *
 * @module core/escape
 */

const ENTITY_MAP: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
};

const REVERSE_ENTITY_MAP: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
};

/**
 * Escape HTML special characters so that arbitrary text can be safely
 * embedded inside an HTML document.
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"]/g, (ch) => ENTITY_MAP[ch] ?? ch);
}

/**
 * Inverse of {@link escapeHtml}.
 *
 * Entities are matched in a single left-to-right pass, so `&amp;lt;`
 * decodes to `&lt;` rather than `<`.
 */
export function unescapeHtml(html: string): string {
  return html.replace(/&(?:amp|lt|gt|quot);/g, (entity) => REVERSE_ENTITY_MAP[entity] ?? entity);
}
