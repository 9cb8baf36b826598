/**
 * Discriminant carried by every error the subtitle core raises
 */
export type SubtitleErrorKind =
  | 'InvalidTime'
  | 'InvalidTimestring'
  | 'ParseError'
  | 'DegenerateSync'
  | 'InsufficientInputs'
  | 'InvalidArgument'
  | 'Usage';

/**
 * Base class for all typed subtitle failures
 */
export class SubtitleError extends Error {
  readonly kind: SubtitleErrorKind;

  constructor(kind: SubtitleErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/**
 * A timecode was built from a value that is not an integral millisecond count or a literal
 */
export class InvalidTimeError extends SubtitleError {
  constructor(
    message: string = 'The time is not of accepted type.',
    kind: 'InvalidTime' | 'InvalidTimestring' = 'InvalidTime'
  ) {
    super(kind, message);
  }
}

/**
 * A timecode literal did not match any accepted shape
 */
export class InvalidTimestringError extends InvalidTimeError {
  readonly input: string;

  constructor(input: string) {
    super(`The timestring is not formatted correctly: "${input}"`, 'InvalidTimestring');
    this.input = input;
  }
}

export class SrtParseError extends SubtitleError {
  /** 1-based position of the offending block, when known */
  readonly block?: number;

  constructor(message: string, block?: number, cause?: unknown) {
    super('ParseError', block === undefined ? message : `Block ${block}: ${message}`, { cause });
    this.block = block;
  }
}

export class DegenerateSyncError extends SubtitleError {
  constructor() {
    super('DegenerateSync', 'Cannot sync: the target timecode equals the anchor.');
  }
}

export class InsufficientInputsError extends SubtitleError {
  constructor(message: string) {
    super('InsufficientInputs', message);
  }
}

export class InvalidArgumentError extends SubtitleError {
  constructor(message: string) {
    super('InvalidArgument', message);
  }
}

/**
 * Missing or malformed user-supplied options (command line flags, form fields)
 */
export class UsageError extends SubtitleError {
  constructor(message: string) {
    super('Usage', message);
  }
}
