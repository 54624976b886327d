import type { Logger } from '@notestore/shared';

import { classifyRun } from './attachmentClassifier';
import { describeError } from './errors';
import {
  ATTACHMENT_PLACEHOLDER,
  type AttachmentLookup,
  type AttachmentRef,
  type FileMarker,
  type InlineSubstitution,
  type MarkerCandidate,
  type ResolveOptions,
  type ResolvedContent,
  type StyledRun,
} from './types';

/**
 * First pass: walk the runs with a cursor built only from the summed run lengths and note
 * where each attachment run keeps its placeholder. Offsets refer to the raw text.
 */
export function collectMarkerCandidates(rawText: string, runs: StyledRun[]): MarkerCandidate[] {
  const candidates: MarkerCandidate[] = [];
  let pos = 0;
  for (const run of runs) {
    const classified = classifyRun(run);
    if (classified.kind !== 'plain') {
      const segment = rawText.slice(pos, pos + run.length);
      const index = segment.indexOf(ATTACHMENT_PLACEHOLDER);
      if (index !== -1) {
        candidates.push({
          markerOffset: pos + index,
          ref: classified.ref,
          attachmentClass:
            classified.kind === 'inline'
              ? { kind: 'inline', inline: classified.inline }
              : { kind: 'file' },
        });
      }
    }
    pos += run.length;
  }
  return candidates;
}

function lookupLiteral(
  lookup: AttachmentLookup | undefined,
  ref: AttachmentRef,
  logger: Logger,
): string | undefined {
  if (!lookup) {
    return undefined;
  }
  try {
    const literal = lookup(ref.identifier, ref.classifier);
    return literal ? literal : undefined;
  } catch (err) {
    logger.warn(
      `[note-decoder] lookup failed for ${ref.identifier} (${ref.classifier}): ${describeError(err)}`,
    );
    return undefined;
  }
}

/**
 * Second pass: visit the candidates in raw-offset order, splicing inline text and carrying the
 * accumulated length change forward so every recorded offset indexes the returned text.
 */
export function applySubstitutions(
  rawText: string,
  candidates: MarkerCandidate[],
  lookup: AttachmentLookup | undefined,
  options: ResolveOptions = {},
): ResolvedContent {
  const logger = options.logger ?? console;
  const ordered = [...candidates].sort((a, b) => a.markerOffset - b.markerOffset);

  const pieces: string[] = [];
  const positions = new Map<string, number>();
  const fileMarkers: FileMarker[] = [];
  const substitutions: InlineSubstitution[] = [];
  let cursor = 0;
  let shift = 0;

  for (const candidate of ordered) {
    const adjustedOffset = candidate.markerOffset + shift;
    pieces.push(rawText.slice(cursor, candidate.markerOffset));
    cursor = candidate.markerOffset + 1;

    const literal = lookupLiteral(lookup, candidate.ref, logger);
    if (literal !== undefined) {
      pieces.push(literal);
      shift += literal.length - 1;
      substitutions.push({
        ref: candidate.ref,
        kind:
          candidate.attachmentClass.kind === 'inline' ? candidate.attachmentClass.inline : 'other',
        offset: adjustedOffset,
        text: literal,
      });
      continue;
    }

    pieces.push(ATTACHMENT_PLACEHOLDER);
    positions.set(candidate.ref.identifier, adjustedOffset);
    fileMarkers.push({
      ref: candidate.ref,
      offset: adjustedOffset,
      ...(candidate.attachmentClass.kind === 'inline' ? { degradedFrom: 'inline' as const } : {}),
    });
  }
  pieces.push(rawText.slice(cursor));

  return { text: pieces.join(''), positions, fileMarkers, substitutions };
}

export function resolveAttachments(
  rawText: string,
  runs: StyledRun[],
  lookup: AttachmentLookup | undefined,
  options: ResolveOptions = {},
): ResolvedContent {
  const candidates = collectMarkerCandidates(rawText, runs);
  return applySubstitutions(rawText, candidates, lookup, options);
}
