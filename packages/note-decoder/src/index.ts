export {
  ATTACHMENT_PLACEHOLDER,
  type AttachmentClass,
  type AttachmentLookup,
  type AttachmentRef,
  type DecodeNoteOptions,
  type DecodedNoteContent,
  type FileMarker,
  type InlineKind,
  type InlineSubstitution,
  type MarkerCandidate,
  type ResolveOptions,
  type ResolvedContent,
  type StructuredNote,
  type StyledRun,
} from './types';
export {
  DecompressionError,
  NoteDecodeError,
  SchemaDecodeError,
  describeError,
  isNoteDecodeError,
  type NoteDecodeErrorCode,
} from './errors';
export {
  GZIP_MAGIC,
  decompressPayload,
  inflatePartialPayload,
  isGzipPayload,
} from './decompress';
export {
  NOTE_STORE_PROTO_PATH,
  encodeNoteStore,
  getNoteStoreType,
  type EncodeNoteStoreOptions,
} from './noteStoreSchema';
export { decodeNoteStore } from './structuredDecoder';
export {
  classifyAttachment,
  classifyRun,
  isInlineClassifier,
  type ClassifiedRun,
} from './attachmentClassifier';
export {
  applySubstitutions,
  collectMarkerCandidates,
  resolveAttachments,
} from './attachmentResolver';
export {
  DEFAULT_JUNK_SUBSTRINGS,
  DEFAULT_MOJIBAKE_CHARS,
  DEFAULT_NOISE_FILTERS,
  DEFAULT_TRAILING_JUNK_PATTERNS,
  isJunkString,
  isTrailingJunkLine,
  resolveNoiseFilters,
  type NoiseFilterOptions,
} from './noiseFilters';
export {
  extractFallbackText,
  extractPrintableRuns,
  isPrintableByte,
  trimTrailingJunk,
} from './fallbackExtractor';
export { decodeNoteContent } from './decodeNote';
