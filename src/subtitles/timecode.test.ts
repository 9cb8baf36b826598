import { describe, it, expect } from 'vitest';
import { Timecode, parseTimecode } from './timecode';
import { InvalidArgumentError, InvalidTimeError, InvalidTimestringError } from './errors';

describe('Timecode.fromLiteral', () => {
  it('should parse the full HH:MM:SS,mmm form', () => {
    expect(Timecode.fromLiteral('00:00:00,000').ms).toBe(0);
    expect(Timecode.fromLiteral('01:30:45,500').ms).toBe(5445500);
    expect(Timecode.fromLiteral('00:00:00,001').ms).toBe(1);
  });

  it('should parse the shorter forms by length', () => {
    expect(Timecode.fromLiteral('02:03,456').ms).toBe(123456);
    expect(Timecode.fromLiteral('03,456').ms).toBe(3456);
    expect(Timecode.fromLiteral('02:03').ms).toBe(123000);
  });

  it('should treat up to three bare digits as seconds', () => {
    expect(Timecode.fromLiteral('5').ms).toBe(5000);
    expect(Timecode.fromLiteral('45').ms).toBe(45000);
    expect(Timecode.fromLiteral('120').ms).toBe(120000);
  });

  it('should negate values with a leading minus', () => {
    expect(Timecode.fromLiteral('-00:00:01,500').ms).toBe(-1500);
    expect(Timecode.fromLiteral('-02:00').ms).toBe(-120000);
    expect(Timecode.fromLiteral('-3').ms).toBe(-3000);
  });

  it('should not range-check components', () => {
    expect(Timecode.fromLiteral('00:99:00,000').ms).toBe(99 * 60 * 1000);
  });

  it('should reject literals of an unsupported length', () => {
    for (const literal of ['', '-', '1234', '00:00:0,000', '00:00:00,0000', '100:00:00,000']) {
      expect(() => Timecode.fromLiteral(literal)).toThrow(InvalidTimestringError);
    }
  });

  it('should reject literals of the right length but the wrong shape', () => {
    for (const literal of ['00:00:01.500', 'ab:cd:ef,ghi', '1a', '--5', '12,34:5']) {
      expect(() => Timecode.fromLiteral(literal)).toThrow(InvalidTimestringError);
    }
  });

  it('should report the InvalidTimestring kind', () => {
    try {
      parseTimecode('00:00:00,0000');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidTimeError);
      expect(error).toMatchObject({ kind: 'InvalidTimestring', input: '00:00:00,0000' });
    }
  });
});

describe('Timecode.fromMilliseconds', () => {
  it('should wrap integral counts', () => {
    expect(Timecode.fromMilliseconds(1500).ms).toBe(1500);
    expect(Timecode.fromMilliseconds(-42).ms).toBe(-42);
  });

  it('should reject non-integral counts with InvalidTime', () => {
    for (const value of [1.5, NaN, Infinity]) {
      expect(() => Timecode.fromMilliseconds(value)).toThrow(InvalidTimeError);
    }
    expect(() => Timecode.fromMilliseconds(0.5)).toThrow('Not an integral millisecond count: 0.5');
  });
});

describe('Timecode.stringify', () => {
  it('should format milliseconds as HH:MM:SS,mmm', () => {
    expect(Timecode.stringify(0)).toBe('00:00:00,000');
    expect(Timecode.stringify(1)).toBe('00:00:00,001');
    expect(Timecode.stringify(5445500)).toBe('01:30:45,500');
    expect(Timecode.stringify(86399999)).toBe('23:59:59,999');
  });

  it('should prefix negative values with a minus', () => {
    expect(Timecode.stringify(-1500)).toBe('-00:00:01,500');
    expect(Timecode.fromMilliseconds(-3723004).toString()).toBe('-01:02:03,004');
  });

  it('should let hours grow past two digits', () => {
    expect(Timecode.stringify(100 * 3600 * 1000)).toBe('100:00:00,000');
  });

  it('should round-trip through the parser', () => {
    for (const ms of [0, 1, 999, 1000, 59999, 60000, 3599999, 3600000, 86399999, 359999999]) {
      expect(Timecode.fromLiteral(Timecode.stringify(ms)).ms).toBe(ms);
      if (ms > 0) {
        expect(Timecode.fromLiteral(Timecode.stringify(-ms)).ms).toBe(-ms);
      }
    }
  });
});

describe('Timecode arithmetic', () => {
  const a = Timecode.fromLiteral('00:00:05,000');
  const b = Timecode.fromLiteral('00:00:01,250');

  it('should add and subtract exactly', () => {
    expect(a.add(b).ms).toBe(6250);
    expect(a.subtract(b).ms).toBe(3750);
    expect(b.subtract(a).ms).toBe(-3750);
  });

  it('should negate and take the absolute value', () => {
    expect(a.negate().ms).toBe(-5000);
    expect(a.negate().abs().ms).toBe(5000);
    expect(Timecode.ZERO.negate().ms).toBe(0);
  });

  it('should never mutate the operands', () => {
    a.add(b);
    a.negate();
    expect(a.ms).toBe(5000);
    expect(b.ms).toBe(1250);
  });

  it('should truncate scaled values toward zero', () => {
    expect(Timecode.fromMilliseconds(1001).scale(1.5).ms).toBe(1501);
    expect(Timecode.fromMilliseconds(-1001).scale(1.5).ms).toBe(-1501);
    expect(Timecode.fromMilliseconds(333).scale(-1.5).ms).toBe(-499);
    expect(Timecode.fromMilliseconds(1).scale(-0.5).ms).toBe(0);
  });

  it('should not guarantee that scaling back restores the value', () => {
    const scaled = Timecode.fromMilliseconds(1001).scale(1 / 3);
    expect(scaled.ms).toBe(333);
    expect(scaled.scale(3).ms).toBe(999);
  });

  it('should reject non-finite factors', () => {
    expect(() => a.scale(Infinity)).toThrow(InvalidArgumentError);
    expect(() => a.scale(NaN)).toThrow(InvalidArgumentError);
  });

  it('should blame the factor when the product is out of range', () => {
    const second = Timecode.fromMilliseconds(1000);
    expect(() => second.scale(1e20)).toThrow(InvalidArgumentError);
    expect(() => second.scale(1e20)).toThrow('Factor 1e+20 puts 00:00:01,000 out of range');
  });
});
