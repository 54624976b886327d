import type { AttachmentClass, AttachmentRef, InlineKind, StyledRun } from './types';

export type ClassifiedRun =
  | { kind: 'plain'; run: StyledRun }
  | { kind: 'inline'; run: StyledRun; ref: AttachmentRef; inline: InlineKind }
  | { kind: 'file'; run: StyledRun; ref: AttachmentRef };

/**
 * The only place classifier strings are inspected. Inline types can be resolved to literal
 * text; everything else (images, PDFs, drawings, tables) stays a file marker.
 */
export function classifyAttachment(classifier: string): AttachmentClass {
  const lowered = classifier.toLowerCase();
  if (lowered.includes('hashtag')) {
    return { kind: 'inline', inline: 'hashtag' };
  }
  if (lowered.includes('mention')) {
    return { kind: 'inline', inline: 'mention' };
  }
  return { kind: 'file' };
}

export function isInlineClassifier(classifier: string): boolean {
  return classifyAttachment(classifier).kind === 'inline';
}

export function classifyRun(run: StyledRun): ClassifiedRun {
  const ref = run.attachment;
  if (!ref) {
    return { kind: 'plain', run };
  }
  const cls = classifyAttachment(ref.classifier);
  if (cls.kind === 'inline') {
    return { kind: 'inline', run, ref, inline: cls.inline };
  }
  return { kind: 'file', run, ref };
}
