export { DEFAULT_DB_PATH, loadConfig, type NoteStoreConfig } from './config';
export {
  ConfigError,
  NoteStoreAccessError,
  NoteStoreNotFoundError,
  NoteStoreReadError,
} from './errors';
export {
  AppleNotesStore,
  type AttachmentRecord,
  type NoteRow,
  type NoteStoreReader,
} from './noteStore';
export { createAttachmentLookup } from './attachmentLookup';
export {
  extractAllNotes,
  extractNotesFromConfig,
  type AppleNote,
  type ExtractNotesOptions,
  type ExtractionResult,
  type NoteAttachment,
  type NoteContentSource,
  type NoteExtractionFailure,
} from './extractor';
export {
  CORE_DATA_EPOCH_OFFSET_SECONDS,
  appleTimestampToDate,
  appleTimestampToIso,
} from './timestamps';
