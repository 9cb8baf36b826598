import { InvalidArgumentError, InvalidTimeError, InvalidTimestringError } from './errors';

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;

/**
 * Accepted literal shapes, keyed by the length of the unsigned literal.
 * Capture groups are hours, minutes, seconds, milliseconds; absent groups count as zero.
 */
const LITERAL_SHAPES: Record<number, { pattern: RegExp; groups: Array<'h' | 'm' | 's' | 'ms'> }> =
  {
    12: { pattern: /^(\d{2}):(\d{2}):(\d{2}),(\d{3})$/, groups: ['h', 'm', 's', 'ms'] },
    9: { pattern: /^(\d{2}):(\d{2}),(\d{3})$/, groups: ['m', 's', 'ms'] },
    6: { pattern: /^(\d{2}),(\d{3})$/, groups: ['s', 'ms'] },
    5: { pattern: /^(\d{2}):(\d{2})$/, groups: ['m', 's'] },
    3: { pattern: /^(\d{3})$/, groups: ['s'] },
    2: { pattern: /^(\d{2})$/, groups: ['s'] },
    1: { pattern: /^(\d)$/, groups: ['s'] },
  };

/**
 * Signed millisecond offset on a subtitle timeline.
 * The same type serves as an instant (an entry's start or end) and as a duration (a shift).
 */
export class Timecode {
  static readonly ZERO = new Timecode(0);

  readonly ms: number;

  private constructor(ms: number) {
    this.ms = ms;
  }

  /**
   * Wraps an integral millisecond count
   */
  static fromMilliseconds(ms: number): Timecode {
    if (!Number.isSafeInteger(ms)) {
      throw new InvalidTimeError(`Not an integral millisecond count: ${ms}`);
    }
    // normalize -0
    return new Timecode(ms === 0 ? 0 : ms);
  }

  /**
   * Parses a timecode literal such as "01:02:03,456", "02:03,456", "03,456", "02:03" or "3",
   * optionally prefixed with "-"
   */
  static fromLiteral(text: string): Timecode {
    const negative = text.startsWith('-');
    const unsigned = negative ? text.slice(1) : text;

    const shape = LITERAL_SHAPES[unsigned.length];
    const match = shape?.pattern.exec(unsigned);
    if (!shape || !match) {
      throw new InvalidTimestringError(text);
    }

    const parts = { h: 0, m: 0, s: 0, ms: 0 };
    shape.groups.forEach((group, i) => {
      parts[group] = parseInt(match[i + 1] ?? '0', 10);
    });

    const total =
      parts.h * MS_PER_HOUR + parts.m * MS_PER_MINUTE + parts.s * MS_PER_SECOND + parts.ms;

    return Timecode.fromMilliseconds(negative ? -total : total);
  }

  /**
   * Formats a millisecond count as "HH:MM:SS,mmm", with a leading "-" when negative.
   * Hours are padded to two digits and grow beyond that as needed.
   */
  static stringify(total: number): string {
    const negative = total < 0;
    let rest = Math.abs(total);

    const milliseconds = rest % 1000;
    rest = Math.floor(rest / 1000);
    const seconds = rest % 60;
    rest = Math.floor(rest / 60);
    const minutes = rest % 60;
    const hours = Math.floor(rest / 60);

    return (
      (negative ? '-' : '') +
      `${hours.toString().padStart(2, '0')}:` +
      `${minutes.toString().padStart(2, '0')}:` +
      `${seconds.toString().padStart(2, '0')},` +
      `${milliseconds.toString().padStart(3, '0')}`
    );
  }

  add(other: Timecode): Timecode {
    return Timecode.fromMilliseconds(this.ms + other.ms);
  }

  subtract(other: Timecode): Timecode {
    return Timecode.fromMilliseconds(this.ms - other.ms);
  }

  /**
   * Multiplies by a factor and truncates toward zero. Lossy: scaling back by 1/factor
   * does not necessarily restore the original value.
   */
  scale(factor: number): Timecode {
    if (!Number.isFinite(factor)) {
      throw new InvalidArgumentError(`Invalid factor to multiply by: ${factor}`);
    }
    const product = Math.trunc(this.ms * factor);
    if (!Number.isSafeInteger(product)) {
      throw new InvalidArgumentError(`Factor ${factor} puts ${this} out of range`);
    }
    return Timecode.fromMilliseconds(product);
  }

  negate(): Timecode {
    return Timecode.fromMilliseconds(-this.ms);
  }

  abs(): Timecode {
    return Timecode.fromMilliseconds(Math.abs(this.ms));
  }

  toString(): string {
    return Timecode.stringify(this.ms);
  }
}

/**
 * Parses a timecode literal
 * @throws InvalidTimestringError when the literal matches no accepted shape
 */
export function parseTimecode(text: string): Timecode {
  return Timecode.fromLiteral(text);
}
