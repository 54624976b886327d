import { z } from 'zod';

import { SchemaDecodeError, describeError } from './errors';
import { getNoteStoreType } from './noteStoreSchema';
import type { StructuredNote, StyledRun } from './types';

// Field names follow protobufjs' camelCase conversion of the .proto declarations.
const AttachmentInfoSchema = z.object({
  attachmentIdentifier: z.string().optional(),
  typeUti: z.string().optional(),
});

const AttributeRunSchema = z.object({
  length: z.number().int().nonnegative(),
  attachmentInfo: AttachmentInfoSchema.optional(),
});

const NoteSchema = z.object({
  noteText: z.string(),
  attributeRun: z.array(AttributeRunSchema).optional(),
});

const DocumentSchema = z.object({
  version: z.number().int().optional(),
  note: NoteSchema,
});

const NoteStoreSchema = z.object({
  document: DocumentSchema,
});

type DecodedAttributeRun = z.infer<typeof AttributeRunSchema>;

function toStyledRun(run: DecodedAttributeRun): StyledRun {
  const identifier = run.attachmentInfo?.attachmentIdentifier;
  if (!identifier) {
    return { length: run.length };
  }
  return {
    length: run.length,
    attachment: {
      identifier,
      classifier: run.attachmentInfo?.typeUti ?? '',
    },
  };
}

/**
 * Unmarshals an inflated NoteStore payload into the note text and its attribute runs.
 * Throws SchemaDecodeError when the wire stream is unreadable or a required field is absent.
 */
export function decodeNoteStore(bytes: Uint8Array): StructuredNote {
  const type = getNoteStoreType();

  let plain: Record<string, unknown>;
  try {
    const message = type.decode(bytes);
    plain = type.toObject(message, { longs: Number, defaults: false });
  } catch (err) {
    throw new SchemaDecodeError(`Unreadable note payload: ${describeError(err)}`, '', err);
  }

  const parsed = NoteStoreSchema.safeParse(plain);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const fieldPath = issue ? issue.path.join('.') : '';
    throw new SchemaDecodeError(
      `Missing or invalid field ${fieldPath || '(root)'}: ${issue?.message ?? 'invalid'}`,
      fieldPath,
      parsed.error.issues,
    );
  }

  const note = parsed.data.document.note;
  return {
    text: note.noteText,
    runs: (note.attributeRun ?? []).map(toStyledRun),
  };
}
