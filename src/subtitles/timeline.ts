import type { SubtitleDocument } from './types';
import { Timecode } from './timecode';
import { DegenerateSyncError, InsufficientInputsError, InvalidArgumentError } from './errors';

/*
 * Timeline operations. Each one rewrites the entries of the document it is given
 * and returns that same document.
 */

/**
 * Moves every entry by a duration. Results may become negative.
 * @param document - Document to shift
 * @param delta - Duration to add to every start and end
 */
export function shiftTimeBy(document: SubtitleDocument, delta: Timecode): SubtitleDocument {
  for (const entry of document.entries) {
    entry.start = entry.start.add(delta);
    entry.end = entry.end.add(delta);
  }
  return document;
}

/**
 * Moves every entry so that the instant `target` lands on `to`
 */
export function shiftTimeTo(
  document: SubtitleDocument,
  target: Timecode,
  to: Timecode
): SubtitleDocument {
  return shiftTimeBy(document, to.subtract(target));
}

/**
 * Multiplies every start and end by a factor, truncating toward zero
 */
export function multiplyTimeBy(document: SubtitleDocument, factor: number): SubtitleDocument {
  if (!Number.isFinite(factor)) {
    throw new InvalidArgumentError(`Invalid factor to multiply by: ${factor}`);
  }

  for (const entry of document.entries) {
    entry.start = entry.start.scale(factor);
    entry.end = entry.end.scale(factor);
  }
  return document;
}

export function shiftIndexBy(document: SubtitleDocument, n: number): SubtitleDocument {
  if (!Number.isSafeInteger(n)) {
    throw new InvalidArgumentError(`Invalid index offset: ${n}`);
  }

  for (const entry of document.entries) {
    entry.index += n;
  }
  return document;
}

/**
 * Stretches (factor > 1) or squeezes (factor < 1) the timeline while `anchor` stays put
 * @param document - Document to resize
 * @param anchor - Instant held fixed
 * @param factor - Scale applied to every instant's distance from the anchor
 */
export function resize(
  document: SubtitleDocument,
  anchor: Timecode,
  factor: number
): SubtitleDocument {
  shiftTimeBy(document, anchor.negate());
  multiplyTimeBy(document, factor);
  return shiftTimeBy(document, anchor);
}

/**
 * Renumbers entries 1..n in their current order
 */
export function reindex(document: SubtitleDocument): SubtitleDocument {
  document.entries.forEach((entry, i) => {
    entry.index = i + 1;
  });
  return document;
}

/**
 * Derives the scale that carries `target` onto `goal` while `anchor` stays fixed
 * @returns (goal - anchor) / (target - anchor)
 * @throws DegenerateSyncError when target and anchor coincide
 */
export function computeSyncFactor(target: Timecode, goal: Timecode, anchor: Timecode): number {
  const span = target.subtract(anchor);
  if (span.ms === 0) {
    throw new DegenerateSyncError();
  }
  return goal.subtract(anchor).ms / span.ms;
}

/**
 * Makes the instant `target` become `goal` by resizing around `anchor`
 */
export function sync(
  document: SubtitleDocument,
  target: Timecode,
  goal: Timecode,
  anchor: Timecode = Timecode.ZERO
): SubtitleDocument {
  return resize(document, anchor, computeSyncFactor(target, goal, anchor));
}

/**
 * Chains documents back to back: each one is shifted to begin where the previous one's
 * last entry ends, appended to the first document, and the result is renumbered.
 * The first document is extended in place and returned; the others are shifted in place.
 * @param documents - At least two non-empty documents, in timeline order
 */
export function merge(documents: SubtitleDocument[]): SubtitleDocument {
  const [base, ...rest] = documents;
  if (!base || rest.length === 0) {
    throw new InsufficientInputsError(
      'What good is there to merge, when there is naught but one item?'
    );
  }

  const emptyAt = documents.findIndex((document) => document.entries.length === 0);
  if (emptyAt !== -1) {
    throw new InsufficientInputsError(`Document ${emptyAt + 1} has no entries to merge`);
  }

  let offset = lastEnd(base);
  for (const document of rest) {
    shiftTimeBy(document, offset);
    base.entries.push(...document.entries);
    offset = lastEnd(document);
  }

  return reindex(base);
}

function lastEnd(document: SubtitleDocument): Timecode {
  const last = document.entries[document.entries.length - 1];
  if (!last) {
    throw new InsufficientInputsError('Cannot anchor a merge on an empty document');
  }
  return last.end;
}

/**
 * Replaces every literal occurrence of `find` in the entries' text, left to right
 * @param document - Document to edit
 * @param find - String to search for; an empty one matches before every character and at the end
 * @param replaceWith - Inserted verbatim; "$" sequences have no special meaning
 */
export function replaceText(
  document: SubtitleDocument,
  find: string,
  replaceWith: string
): SubtitleDocument {
  for (const entry of document.entries) {
    entry.text = entry.text.replaceAll(find, () => replaceWith);
  }
  return document;
}
