/**
 * mdlite - Markdown Preprocessor
 *
 * Normalizes Markdown input before scanning. The scanner treats `\n` as the
 * only line terminator, so other line endings are folded into it here.
 *
 * @module core/preprocessor
 */

/**
 * Remove a leading byte-order mark, which would otherwise sit in front of a
 * heading or list marker on the first line.
 *
 * @param markdown - Raw markdown string.
 * @returns Markdown without a leading U+FEFF.
 */
function stripByteOrderMark(markdown: string): string {
  return markdown.charCodeAt(0) === 0xfeff ? markdown.slice(1) : markdown;
}

/**
 * Normalize `\r\n` and lone `\r` line endings to `\n`.
 *
 * @param markdown - Raw markdown string.
 * @returns Markdown with Unix line endings only.
 */
function normalizeLineEndings(markdown: string): string {
  return markdown.replace(/\r\n?/g, '\n');
}

/**
 * Apply all preprocessor transformations in sequence.
 *
 * @param markdown - Raw markdown input.
 * @returns Preprocessed markdown ready for the scanner.
 */
export function preprocessMarkdown(markdown: string): string {
  let result = stripByteOrderMark(markdown);
  result = normalizeLineEndings(result);
  return result;
}
