/**
 * Citations
 *
 * The assembler labels passages `[1]`, `[2]`, ... and asks the model to
 * cite them. This module reads the labels back out of the answer and
 * formats the cited passages for the terminal.
 *
 * @example
 * ```typescript
 * citedLabels('Refunds take 14 days [2][1], see also [2, 3].');
 * // [1, 2, 3]
 *
 * formatCitations(labeledCitations(answer, request.contextPassages));
 * // [1] s3://docs/refunds.md (0.92)
 * // [3] s3://docs/faq.md (0.81)
 * ```
 */

import { formatScore } from '../search/formatter.js';
import type { Passage } from '../search/types.js';

/** `[1]`, `[1, 2]`, `[1,2,3]` */
const LABEL_PATTERN = /\[(\d+(?:\s*,\s*\d+)*)\]/g;

/**
 * Distinct labels cited in `answer`, ascending.
 */
export function citedLabels(answer: string): number[] {
  const labels = new Set<number>();
  for (const match of answer.matchAll(LABEL_PATTERN)) {
    for (const part of (match[1] ?? '').split(',')) {
      const label = Number.parseInt(part.trim(), 10);
      if (label > 0) labels.add(label);
    }
  }
  return [...labels].sort((a, b) => a - b);
}

export interface LabeledPassage {
  label: number;
  passage: Passage;
}

/**
 * Cited passages with their labels. Labels with no matching passage are
 * ignored.
 */
export function labeledCitations(answer: string, passages: readonly Passage[]): LabeledPassage[] {
  const cited: LabeledPassage[] = [];
  for (const label of citedLabels(answer)) {
    const passage = passages[label - 1];
    if (passage) cited.push({ label, passage });
  }
  return cited;
}

/**
 * Passages whose label is cited in `answer`, in label order, each once.
 */
export function resolveCitations(answer: string, passages: readonly Passage[]): Passage[] {
  return labeledCitations(answer, passages).map((entry) => entry.passage);
}

/** Label every passage by its position */
export function labelPassages(passages: readonly Passage[]): LabeledPassage[] {
  return passages.map((passage, i) => ({ label: i + 1, passage }));
}

export interface CitationFormatOptions {
  /** Show relevance scores (default: true) */
  showScores?: boolean;
  /** Maximum number of citations to display (default: unlimited) */
  limit?: number;
}

/**
 * One line per citation: `[n] <source> (<score>)`.
 */
export function formatCitations(
  citations: readonly LabeledPassage[],
  options: CitationFormatOptions = {}
): string {
  const { showScores = true, limit } = options;
  const shown = limit === undefined ? citations : citations.slice(0, limit);

  const lines = shown.map(({ label, passage }) => {
    const parts = [`[${label}]`, passage.sourceLocator ?? 'unknown source'];
    if (showScores && passage.score !== undefined) parts.push(`(${formatScore(passage.score)})`);
    return parts.join(' ');
  });

  const hidden = citations.length - shown.length;
  if (hidden > 0) lines.push(`... and ${hidden} more`);

  return lines.join('\n');
}
