/**
 * Passage Formatter
 *
 * Formats normalized passages for CLI display and JSON output.
 *
 * @example
 * ```typescript
 * formatPassages(passages);
 * // [1] 0.92  s3://docs/refunds.md
 * //   Refunds are issued within 14 days of the request...
 * ```
 */

import type { FormattedPassageJSON, Passage, PassageFormatOptions } from './types.js';

/** Default maximum preview length in characters */
const DEFAULT_PREVIEW_LENGTH = 200;

/** Indent for preview lines in text output */
const PREVIEW_INDENT = '  ';

/**
 * Format a score as a 2-decimal string, or "-" when absent.
 */
export function formatScore(score: number | undefined): string {
  return score === undefined ? '-' : score.toFixed(2);
}

/**
 * Collapse whitespace and cut to `maxLength` characters with "...".
 */
export function truncatePreview(text: string, maxLength: number = DEFAULT_PREVIEW_LENGTH): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  if (collapsed.length <= maxLength) {
    return collapsed;
  }
  return collapsed.slice(0, maxLength) + '...';
}

/**
 * Format one passage. `label` is its 1-based position.
 */
export function formatPassage(
  passage: Passage,
  label: number,
  options: PassageFormatOptions = {}
): string {
  const { previewLength = DEFAULT_PREVIEW_LENGTH, showScore = true, showSource = true } = options;

  const header = [`[${label}]`];
  if (showScore) header.push(formatScore(passage.score));
  if (showSource && passage.sourceLocator) header.push(passage.sourceLocator);

  return `${header.join('  ')}\n${PREVIEW_INDENT}${truncatePreview(passage.text, previewLength)}`;
}

/**
 * Format passages separated by blank lines.
 */
export function formatPassages(passages: Passage[], options: PassageFormatOptions = {}): string {
  return passages.map((passage, i) => formatPassage(passage, i + 1, options)).join('\n\n');
}

/**
 * JSON-serializable view of passages, with explicit nulls for jq.
 */
export function formatPassagesJSON(passages: Passage[]): FormattedPassageJSON[] {
  return passages.map((passage, i) => {
    const formatted: FormattedPassageJSON = {
      label: i + 1,
      score: passage.score ?? null,
      source: passage.sourceLocator ?? null,
      text: passage.text,
    };
    if (passage.metadata) formatted.metadata = passage.metadata;
    return formatted;
  });
}
