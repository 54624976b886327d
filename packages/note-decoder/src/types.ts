import type { Logger } from '@notestore/shared';

import type { NoiseFilterOptions } from './noiseFilters';

/** U+FFFC OBJECT REPLACEMENT CHARACTER, the placeholder left in note text for attachments. */
export const ATTACHMENT_PLACEHOLDER = '\uFFFC';

export interface AttachmentRef {
  identifier: string;
  /** Dotted type tag, e.g. `public.jpeg` or `com.apple.notes.inlinetextattachment.hashtag`. */
  classifier: string;
}

export type InlineKind = 'hashtag' | 'mention';

export type AttachmentClass = { kind: 'inline'; inline: InlineKind } | { kind: 'file' };

export interface StyledRun {
  length: number;
  attachment?: AttachmentRef;
}

export interface StructuredNote {
  text: string;
  runs: StyledRun[];
}

/**
 * Resolves an inline attachment to literal text. Returning `undefined` (or an empty string)
 * leaves the placeholder in the text as a file marker.
 */
export type AttachmentLookup = (identifier: string, classifier: string) => string | undefined;

export interface MarkerCandidate {
  /** Offset of the placeholder in the raw, unsubstituted text. */
  markerOffset: number;
  ref: AttachmentRef;
  attachmentClass: AttachmentClass;
}

export interface InlineSubstitution {
  ref: AttachmentRef;
  /** `other` when a lookup returned text for a ref not classified as inline. */
  kind: InlineKind | 'other';
  /** Offset where the literal text starts in the final text. */
  offset: number;
  text: string;
}

export interface FileMarker {
  ref: AttachmentRef;
  /** Offset of the placeholder in the final text. */
  offset: number;
  /** Set when an inline classifier could not be resolved to text. */
  degradedFrom?: 'inline';
}

export interface ResolvedContent {
  text: string;
  /** Identifier to final placeholder offset, for refs left as file markers only. */
  positions: Map<string, number>;
  fileMarkers: FileMarker[];
  substitutions: InlineSubstitution[];
}

export interface ResolveOptions {
  logger?: Logger;
}

export interface DecodeNoteOptions {
  lookup?: AttachmentLookup;
  logger?: Logger;
  noiseFilters?: Partial<NoiseFilterOptions>;
}

export type DecodedNoteContent =
  | ({ source: 'structured' } & ResolvedContent)
  | ({ source: 'fallback'; error: Error } & ResolvedContent);
