import { isInlineClassifier, type AttachmentLookup } from '@notestore/note-decoder';

import type { NoteStoreReader } from './noteStore';

/**
 * Hashtags and mentions keep their display text (`#todo`, `@Alice`) in ZALTTEXT. Other
 * attachment types never resolve to text, so the database is not consulted for them.
 */
export function createAttachmentLookup(
  reader: Pick<NoteStoreReader, 'getAttachment'>,
): AttachmentLookup {
  return (identifier, classifier) => {
    if (!isInlineClassifier(classifier)) {
      return undefined;
    }
    const record = reader.getAttachment(identifier);
    return record?.altText ?? undefined;
  };
}
