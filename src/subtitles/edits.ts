import type { SubtitleDocument } from './types';
import { Timecode } from './timecode';
import { UsageError } from './errors';
import { parseSrtDocument, serializeSrtDocument } from './srtParser';
import {
  merge,
  reindex,
  replaceText,
  resize,
  shiftIndexBy,
  shiftTimeBy,
  shiftTimeTo,
  sync,
} from './timeline';

/**
 * A single validated edit, ready to be applied to any number of documents
 */
export type SubtitleEdit =
  | { kind: 'shift'; target: Timecode; to: Timecode }
  | { kind: 'shiftby'; by: Timecode }
  | { kind: 'stretch'; factor: number; anchor: Timecode }
  | { kind: 'sync'; target: Timecode; goal: Timecode; anchor: Timecode }
  | { kind: 'reindex' }
  | { kind: 'shiftindex'; by: number }
  | { kind: 'replace'; find: string; replaceWith: string };

export type EditOperation = SubtitleEdit['kind'];

/** Operation names accepted by {@link parseEditOptions}, aliases included */
export const EDIT_OPERATIONS = [
  'shift',
  'shiftby',
  'stretch',
  'squeeze',
  'sync',
  'reindex',
  'shiftindex',
  'replace',
] as const;

const OPERATION_ALIASES: Record<string, EditOperation> = {
  squeeze: 'stretch',
};

export type EditOptions = Record<string, string | undefined>;

export interface EditDefaults {
  /** Anchor literal used by stretch and sync when none is given */
  anchor: string;
}

const EDIT_KINDS: readonly EditOperation[] = [
  'shift',
  'shiftby',
  'stretch',
  'sync',
  'reindex',
  'shiftindex',
  'replace',
];

function isEditOperation(name: string): name is EditOperation {
  return EDIT_KINDS.some((kind) => kind === name);
}

/**
 * Resolves an operation name (or alias) to its canonical edit kind
 * @returns The edit kind, or null when the name is unknown
 */
export function resolveEditOperation(name: string): EditOperation | null {
  const resolved = OPERATION_ALIASES[name] ?? name;
  return isEditOperation(resolved) ? resolved : null;
}

function requireValue(value: string | undefined, missingMessage: string): string {
  if (value === undefined) {
    throw new UsageError(missingMessage);
  }
  return value;
}

function toTimecode(value: string, invalidMessage: string): Timecode {
  try {
    return Timecode.fromLiteral(value);
  } catch {
    throw new UsageError(invalidMessage);
  }
}

function optionalTimecode(
  value: string | undefined,
  fallback: string,
  invalidMessage: string
): Timecode {
  return toTimecode(value ?? fallback, invalidMessage);
}

function toNumber(value: string, invalidMessage: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!trimmed || !Number.isFinite(parsed)) {
    throw new UsageError(invalidMessage);
  }
  return parsed;
}

/**
 * Turns raw option strings into a validated edit
 * @param operation - Operation name, e.g. "sync" or "squeeze"
 * @param options - Option values keyed by their long name ("target", "replace-with", ...)
 * @param defaults - Values used for options that are optional
 * @throws UsageError when an option is missing or cannot be parsed
 */
export function parseEditOptions(
  operation: string,
  options: EditOptions,
  defaults: EditDefaults
): SubtitleEdit {
  const kind = resolveEditOperation(operation);

  switch (kind) {
    case 'shift':
      return {
        kind,
        target: toTimecode(
          requireValue(options.target, 'Target timecode must be specified.'),
          'Invalid target timecode.'
        ),
        to: toTimecode(
          requireValue(
            options.to,
            'Timecode to which the target is shifted must be specified.'
          ),
          'Invalid timecode to which the target is shifted.'
        ),
      };

    case 'shiftby':
      return {
        kind,
        by: toTimecode(
          requireValue(options.by, 'Duration to shift by must be specified.'),
          'Invalid duration to shift by.'
        ),
      };

    case 'stretch':
      return {
        kind,
        factor: toNumber(
          requireValue(options.factor, 'Factor to multiply by must be specified.'),
          'Invalid factor to multiply by.'
        ),
        anchor: optionalTimecode(options.anchor, defaults.anchor, 'Invalid anchor to base on.'),
      };

    case 'sync':
      return {
        kind,
        target: toTimecode(
          requireValue(options.target, 'A timecode to target must be specified.'),
          'Invalid timecode to target.'
        ),
        goal: toTimecode(
          requireValue(options.goal, 'A timecode as goal must be specified.'),
          'Invalid timecode as goal.'
        ),
        anchor: optionalTimecode(options.anchor, defaults.anchor, 'Invalid anchor to base on.'),
      };

    case 'reindex':
      return { kind };

    case 'shiftindex': {
      const by = toNumber(
        requireValue(options.by, 'Index offset must be specified.'),
        'Invalid index offset.'
      );
      if (!Number.isSafeInteger(by)) {
        throw new UsageError('Invalid index offset.');
      }
      return { kind, by };
    }

    case 'replace': {
      const find = options.find;
      const replaceWith = options['replace-with'];
      if (find === undefined || replaceWith === undefined) {
        throw new UsageError(
          'Both the string to search for and the string to replace with must be specified.'
        );
      }
      return { kind, find, replaceWith };
    }

    case null:
      throw new UsageError(`Unrecognized operation: ${operation}`);
  }
}

/**
 * Applies an edit to a document in place
 */
export function applyEdit(document: SubtitleDocument, edit: SubtitleEdit): SubtitleDocument {
  switch (edit.kind) {
    case 'shift':
      return shiftTimeTo(document, edit.target, edit.to);
    case 'shiftby':
      return shiftTimeBy(document, edit.by);
    case 'stretch':
      return resize(document, edit.anchor, edit.factor);
    case 'sync':
      return sync(document, edit.target, edit.goal, edit.anchor);
    case 'reindex':
      return reindex(document);
    case 'shiftindex':
      return shiftIndexBy(document, edit.by);
    case 'replace':
      return replaceText(document, edit.find, edit.replaceWith);
  }
}

/**
 * Parses SRT content, applies an edit and serializes the result
 */
export function editSrtContent(content: string, edit: SubtitleEdit): string {
  return serializeSrtDocument(applyEdit(parseSrtDocument(content), edit));
}

/**
 * Parses every SRT content, chains them back to back and serializes the merged document
 * @param contents - Raw SRT contents in timeline order (at least two)
 */
export function mergeSrtContents(contents: string[]): string {
  return serializeSrtDocument(merge(contents.map(parseSrtDocument)));
}
