import type { SubtitleDocument, SubtitleEntry } from './types';
import { Timecode } from './timecode';
import { SrtParseError } from './errors';

const INDEX_PATTERN = /^[+-]?\d+$/;
const ARROW = '-->';

/**
 * Parses the timing line of a block ("START --> END")
 * @param line - Second line of the block
 * @param block - 1-based block number, for error reporting
 */
function parseTimingLine(line: string, block: number): { start: Timecode; end: Timecode } {
  const parts = line.split(ARROW);
  if (parts.length !== 2) {
    throw new SrtParseError(`Malformed timestamp line: "${line}"`, block);
  }

  try {
    return {
      start: Timecode.fromLiteral((parts[0] ?? '').trim()),
      end: Timecode.fromLiteral((parts[1] ?? '').trim()),
    };
  } catch (error) {
    throw new SrtParseError(`Malformed timestamp line: "${line}"`, block, error);
  }
}

function parseBlock(raw: string, block: number): SubtitleEntry {
  const lines = raw.split('\n');

  if (lines.length < 2) {
    throw new SrtParseError('Expected an index line and a timestamp line', block);
  }

  const indexLine = (lines[0] ?? '').trim();
  if (!INDEX_PATTERN.test(indexLine)) {
    throw new SrtParseError(`Invalid index: "${lines[0] ?? ''}"`, block);
  }

  const index = parseInt(indexLine, 10);
  if (!Number.isSafeInteger(index)) {
    throw new SrtParseError(`Index out of range: "${indexLine}"`, block);
  }

  const { start, end } = parseTimingLine(lines[1] ?? '', block);

  return {
    index,
    start,
    end,
    text: lines.slice(2).join('\n'),
  };
}

/**
 * Parses SRT content into a document
 * @param content - The raw SRT file content
 * @returns The parsed document, entries in file order
 * @throws SrtParseError on the first malformed block, or when there is no block at all
 */
export function parseSrtDocument(content: string): SubtitleDocument {
  // Normalize line endings, then drop whitespace around the whole document
  const normalized = content.replace(/\r\n/g, '\n').trim();

  if (!normalized) {
    throw new SrtParseError('No subtitle blocks found');
  }

  const entries = normalized.split(/\n{2,}/).map((raw, i) => parseBlock(raw, i + 1));

  return { entries };
}

/**
 * Renders one entry as an SRT block (no trailing newline)
 */
export function formatSrtEntry(entry: SubtitleEntry): string {
  return `${entry.index}\n${entry.start} --> ${entry.end}\n${entry.text}`;
}

/**
 * Generates SRT content from a document, keeping the entries' own indices
 * @param document - Document to serialize
 * @returns SRT file content, blocks separated by one blank line
 */
export function serializeSrtDocument(document: SubtitleDocument): string {
  return document.entries.map(formatSrtEntry).join('\n\n');
}
