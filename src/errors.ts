// errors.ts — error taxonomy shared by every stage of the decoder

export type MidiErrorCode =
  | "TRUNCATED_HEADER"
  | "UNEXPECTED_END_OF_STREAM"
  | "NO_RUNNING_STATUS"
  | "TRACK_OVERRUN"
  | "STATUS_BYTE_ERROR"
  | "INVALID_CHUNK_TYPE"
  | "PUSHBACK"
  | "INVALID_OPTIONS"
  | "SOURCE_READ";

const hex = (value: number): string => `0x${value.toString(16)}`;

export class MidiParseError extends Error {
  constructor(
    message: string,
    public readonly code: MidiErrorCode,
    public readonly offset: number | null,
  ) {
    super(offset === null ? message : `${message} (at ${hex(offset)})`);
    this.name = new.target.name;
  }
}

export class TruncatedHeaderError extends MidiParseError {
  constructor(public readonly available: number) {
    super(
      `Truncated header: need 14 bytes, ${available} available`,
      "TRUNCATED_HEADER",
      available,
    );
  }
}

export class UnexpectedEndOfStreamError extends MidiParseError {
  constructor(
    offset: number,
    public readonly needed: number,
  ) {
    super(`Unexpected EOF: need ${needed} bytes`, "UNEXPECTED_END_OF_STREAM", offset);
  }
}

export class NoRunningStatusError extends MidiParseError {
  constructor(
    offset: number,
    public readonly dataByte: number,
  ) {
    super(
      `Running status used without previous status (data byte ${hex(dataByte)})`,
      "NO_RUNNING_STATUS",
      offset,
    );
  }
}

/** An event that starts inside a track but ends past its declared length. */
export class TrackOverrunError extends MidiParseError {
  constructor(
    offset: number,
    public readonly declaredEnd: number,
  ) {
    super(
      `Event runs past the declared track end ${hex(declaredEnd)}`,
      "TRACK_OVERRUN",
      offset,
    );
  }
}

/** Unrecognized 0xF_ status byte. Reported as a diagnostic, never thrown by the parser. */
export class StatusByteError extends MidiParseError {
  constructor(
    offset: number,
    public readonly status: number,
  ) {
    super(`Unsupported event status: ${hex(status)}`, "STATUS_BYTE_ERROR", offset);
  }
}

export class InvalidChunkTypeError extends MidiParseError {
  constructor(
    offset: number,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(
      `Invalid chunk type: expected ${expected}, got ${JSON.stringify(actual)}`,
      "INVALID_CHUNK_TYPE",
      offset,
    );
  }
}

export class PushbackError extends MidiParseError {
  constructor(offset: number) {
    super("Only the byte just read can be pushed back", "PUSHBACK", offset);
  }
}

export class InvalidOptionsError extends MidiParseError {
  constructor(public readonly issues: string[]) {
    super(`Invalid parse options: ${issues.join("; ")}`, "INVALID_OPTIONS", null);
  }
}

export class SourceReadError extends MidiParseError {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`Cannot read MIDI source ${path}: ${reason}`, "SOURCE_READ", null);
  }
}

/** True for failures that end one track's decode but leave earlier tracks intact. */
export function isTrackScopedError(error: unknown): error is MidiParseError {
  return (
    error instanceof UnexpectedEndOfStreamError ||
    error instanceof NoRunningStatusError ||
    error instanceof TrackOverrunError
  );
}
