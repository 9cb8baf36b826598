import type { Timecode } from './timecode';

/**
 * A single subtitle block of an SRT document
 */
export interface SubtitleEntry {
  /** Display label from the file; neither unique nor sequential on input */
  index: number;
  start: Timecode;
  end: Timecode;
  /** Text lines joined with "\n"; may be empty */
  text: string;
}

/**
 * An SRT document: entries in file order
 */
export interface SubtitleDocument {
  entries: SubtitleEntry[];
}
