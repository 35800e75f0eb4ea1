/**
 * Search Module Types
 *
 * Types for the retrieval client and the result normalizer.
 */

/**
 * One entry of a knowledge-base retrieve response, exactly as the service
 * returned it. Field names vary across knowledge-base configurations, so
 * nothing about its shape is trusted.
 */
export type RawRetrievalResult = Readonly<Record<string, unknown>>;

/** Scalar metadata kept on a passage */
export type PassageMetadata = Record<string, string | number | boolean>;

/**
 * A normalized retrieved passage.
 *
 * `text` is trimmed and never empty. `score` is in [0, 1] when present.
 */
export interface Passage {
  text: string;
  score?: number;
  /** Where the passage came from (S3 URI, web URL, document id) */
  sourceLocator?: string;
  metadata?: PassageMetadata;
}

/**
 * Which alias a passage's text was read from.
 */
export type TextVariantKind =
  | 'content.text'
  | 'content.documentText'
  | 'content[0].text'
  | 'content[0].documentText'
  | 'contents.text'
  | 'contents.documentText'
  | 'contents[0].text'
  | 'contents[0].documentText'
  | 'text'
  | 'documentText'
  | 'document.text'
  | 'chunks'
  | 'preview';

/**
 * Result of matching a raw entry against the text variant table.
 */
export type LocatedText =
  | { kind: TextVariantKind; text: string }
  | { kind: 'unrecognized' };

/** Options for CLI formatting of passages */
export interface PassageFormatOptions {
  /** Maximum preview length in characters (default: 200) */
  previewLength?: number;
  /** Show the score column (default: true) */
  showScore?: boolean;
  /** Show the source locator (default: true) */
  showSource?: boolean;
}

/** JSON shape printed by `--json` */
export interface FormattedPassageJSON {
  label: number;
  score: number | null;
  source: string | null;
  text: string;
  metadata?: PassageMetadata;
}
