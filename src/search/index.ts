/**
 * Search Module
 *
 * Knowledge-base retrieval and result normalization.
 */

export { KnowledgeBaseRetriever, createRetriever, extractResultList } from './retriever.js';

export { normalize, toPassage, locateText, readScore, readSourceLocator } from './normalizer.js';

export { formatScore, truncatePreview, formatPassage, formatPassages, formatPassagesJSON } from './formatter.js';

export type {
  RawRetrievalResult,
  Passage,
  PassageMetadata,
  TextVariantKind,
  LocatedText,
  PassageFormatOptions,
  FormattedPassageJSON,
} from './types.js';
