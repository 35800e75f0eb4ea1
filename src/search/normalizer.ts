/**
 * Result Normalizer
 *
 * Turns raw retrieve results into an ordered, deduplicated list of
 * passages. Every field is read through an alias table: the first alias
 * that yields a usable value wins, and an entry with no usable text is
 * skipped.
 *
 * Ordering: when every passage has a score they are stable-sorted by
 * descending score; otherwise the service order is kept.
 *
 * @example
 * ```typescript
 * normalize([
 *   { content: { text: 'The sky is blue.' }, score: 0.9 },
 *   { text: 'Grass is green.', score: 0.8 },
 *   { content: { text: ' The sky is blue. ' }, score: 0.7 },
 * ]);
 * // [{ text: 'The sky is blue.', score: 0.9 }, { text: 'Grass is green.', score: 0.8 }]
 * ```
 */

import { z } from 'zod';

import type {
  LocatedText,
  Passage,
  PassageMetadata,
  RawRetrievalResult,
  TextVariantKind,
} from './types.js';

// ============================================================================
// TEXT VARIANTS
// ============================================================================

const NonBlank = z.string().refine((value) => value.trim().length > 0);

const TextField = z.object({ text: NonBlank });
const DocumentTextField = z.object({ documentText: NonBlank });

interface TextVariant {
  kind: TextVariantKind;
  read: (raw: unknown) => string | undefined;
}

function variant<T extends z.ZodTypeAny>(
  kind: TextVariantKind,
  schema: T,
  pick: (value: z.infer<T>) => string
): TextVariant {
  return {
    kind,
    read: (raw) => {
      const parsed = schema.safeParse(raw);
      return parsed.success ? pick(parsed.data) : undefined;
    },
  };
}

/** Only the first element of a content list is considered */
function firstOf<T extends z.ZodTypeAny>(element: T) {
  return z.tuple([element]).rest(z.unknown());
}

/** Text aliases in priority order */
const TEXT_VARIANTS: readonly TextVariant[] = [
  variant('content.text', z.object({ content: TextField }), (v) => v.content.text),
  variant(
    'content.documentText',
    z.object({ content: DocumentTextField }),
    (v) => v.content.documentText
  ),
  variant('content[0].text', z.object({ content: firstOf(TextField) }), (v) => v.content[0].text),
  variant(
    'content[0].documentText',
    z.object({ content: firstOf(DocumentTextField) }),
    (v) => v.content[0].documentText
  ),
  variant('contents.text', z.object({ contents: TextField }), (v) => v.contents.text),
  variant(
    'contents.documentText',
    z.object({ contents: DocumentTextField }),
    (v) => v.contents.documentText
  ),
  variant('contents[0].text', z.object({ contents: firstOf(TextField) }), (v) => v.contents[0].text),
  variant(
    'contents[0].documentText',
    z.object({ contents: firstOf(DocumentTextField) }),
    (v) => v.contents[0].documentText
  ),
  variant('text', TextField, (v) => v.text),
  variant('documentText', DocumentTextField, (v) => v.documentText),
  variant('document.text', z.object({ document: TextField }), (v) => v.document.text),
  variant('chunks', z.object({ chunks: NonBlank }), (v) => v.chunks),
  variant('preview', z.object({ preview: NonBlank }), (v) => v.preview),
];

/**
 * Find the passage text of a raw entry.
 */
export function locateText(raw: RawRetrievalResult): LocatedText {
  for (const textVariant of TEXT_VARIANTS) {
    const text = textVariant.read(raw);
    if (text !== undefined) {
      return { kind: textVariant.kind, text: text.trim() };
    }
  }
  return { kind: 'unrecognized' };
}

// ============================================================================
// OTHER FIELDS
// ============================================================================

const SCORE_KEYS = ['score', 'similarity', 'relevanceScore'] as const;

/** Paths tried for the source locator, in priority order */
const SOURCE_PATHS: readonly (readonly string[])[] = [
  ['sourceLocator'],
  ['location', 's3Location', 'uri'],
  ['location', 'webLocation', 'url'],
  ['location', 'confluenceLocation', 'url'],
  ['location', 'salesforceLocation', 'url'],
  ['location', 'sharePointLocation', 'url'],
  ['location', 'customDocumentLocation', 'id'],
  ['metadata', 'x-amz-bedrock-kb-source-uri'],
  ['documentId'],
  ['id'],
  ['document', 'id'],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function valueAt(raw: unknown, path: readonly string[]): unknown {
  let current = raw;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/**
 * First finite score alias, clamped to [0, 1].
 */
export function readScore(raw: RawRetrievalResult): number | undefined {
  for (const key of SCORE_KEYS) {
    const value = raw[key];
    if (typeof value === 'number' && Number.isFinite(value)) {
      return Math.min(1, Math.max(0, value));
    }
  }
  return undefined;
}

export function readSourceLocator(raw: RawRetrievalResult): string | undefined {
  for (const path of SOURCE_PATHS) {
    const value = valueAt(raw, path);
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return undefined;
}

function readMetadata(raw: RawRetrievalResult): PassageMetadata | undefined {
  const source = isRecord(raw.metadata) ? raw.metadata : valueAt(raw, ['document', 'metadata']);
  if (!isRecord(source)) return undefined;

  const metadata: PassageMetadata = {};
  for (const [key, value] of Object.entries(source)) {
    if (
      typeof value === 'string' ||
      typeof value === 'boolean' ||
      (typeof value === 'number' && Number.isFinite(value))
    ) {
      metadata[key] = value;
    }
  }
  return Object.keys(metadata).length > 0 ? metadata : undefined;
}

/**
 * Map one raw entry to a passage, or undefined when it has no text.
 */
export function toPassage(raw: RawRetrievalResult): Passage | undefined {
  const located = locateText(raw);
  if (located.kind === 'unrecognized') return undefined;

  const passage: Passage = { text: located.text };
  const score = readScore(raw);
  if (score !== undefined) passage.score = score;
  const sourceLocator = readSourceLocator(raw);
  if (sourceLocator !== undefined) passage.sourceLocator = sourceLocator;
  const metadata = readMetadata(raw);
  if (metadata !== undefined) passage.metadata = metadata;
  return passage;
}

// ============================================================================
// NORMALIZE
// ============================================================================

/** Absent scores rank below any present score */
function outranks(candidate: Passage, incumbent: Passage): boolean {
  if (candidate.score === undefined) return false;
  if (incumbent.score === undefined) return true;
  return candidate.score > incumbent.score;
}

/**
 * Normalize raw results into passages.
 *
 * Non-object entries are ignored. Duplicate texts (after trimming) collapse
 * to the highest-scoring copy, kept in the slot of the first occurrence.
 * Running the output back through `normalize` returns it unchanged.
 */
export function normalize(results: readonly unknown[]): Passage[] {
  const slots: Passage[] = [];
  const slotByText = new Map<string, number>();

  for (const raw of results) {
    if (!isRecord(raw)) continue;
    const passage = toPassage(raw);
    if (!passage) continue;

    const slot = slotByText.get(passage.text);
    if (slot === undefined) {
      slotByText.set(passage.text, slots.length);
      slots.push(passage);
      continue;
    }

    const incumbent = slots[slot];
    if (incumbent && outranks(passage, incumbent)) {
      slots[slot] = passage;
    }
  }

  const allScored = slots.every((passage) => passage.score !== undefined);
  if (!allScored) return slots;

  // Array.prototype.sort is stable
  return [...slots].sort((a, b) => (b.score ?? 0) - (a.score ?? 0));
}
