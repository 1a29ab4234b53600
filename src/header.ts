// header.ts — MThd and MTrk chunk headers

import { InvalidChunkTypeError, TruncatedHeaderError, UnexpectedEndOfStreamError } from "./errors";
import type { ByteReader } from "./reader";
import type { Diagnostic, MidiHeader, TimeDivision, TrackChunkDescriptor } from "./types";

export const HEADER_CHUNK_SIZE = 14;
export const TRACK_CHUNK_HEADER_SIZE = 8;

export function decodeTimeDivision(division: number): TimeDivision {
  if (division & 0x8000) {
    // SMPTE division: high byte is the negated frame rate
    const fpsRaw = (division >> 8) & 0xff;
    const fps = fpsRaw > 127 ? fpsRaw - 256 : fpsRaw; // Convert to signed byte
    return {
      type: "smpte",
      framesPerSecond: Math.abs(fps),
      ticksPerFrame: division & 0xff,
    };
  }
  return { type: "ppq", ticksPerQuarter: division };
}

function checkChunkType(
  expected: string,
  actual: string,
  offset: number,
  strict: boolean,
  report: (diagnostic: Diagnostic) => void,
  track?: number,
) {
  if (actual === expected) return;
  const error = new InvalidChunkTypeError(offset, expected, actual);
  if (strict) throw error;
  report({
    level: "warning",
    code: error.code,
    message: error.message,
    offset,
    ...(track === undefined ? {} : { track }),
  });
}

/**
 * Reads the fixed 14-byte file header. Only the five fixed fields are
 * consumed; a declared length other than 6 does not move the cursor.
 */
export function readHeader(
  reader: ByteReader,
  strictChunkTypes: boolean,
  report: (diagnostic: Diagnostic) => void,
): MidiHeader {
  if (reader.remaining < HEADER_CHUNK_SIZE) {
    throw new TruncatedHeaderError(reader.remaining);
  }

  const start = reader.position;
  const chunkType = reader.readFourCC();
  checkChunkType("MThd", chunkType, start, strictChunkTypes, report);

  const declaredLength = reader.readUint32();
  const format = reader.readUint16();
  const trackCount = reader.readUint16();
  const timeDivision = reader.readUint16();

  if (format > 2) {
    report({
      level: "warning",
      code: "UNSUPPORTED_FORMAT",
      message: `Unsupported MIDI format: ${format}`,
      offset: start + 8,
    });
  }

  return {
    chunkType,
    declaredLength,
    format,
    trackCount,
    timeDivision,
    division: decodeTimeDivision(timeDivision),
  };
}

export function readTrackChunk(
  reader: ByteReader,
  track: number,
  strictChunkTypes: boolean,
  report: (diagnostic: Diagnostic) => void,
): TrackChunkDescriptor {
  const start = reader.position;
  if (reader.remaining < TRACK_CHUNK_HEADER_SIZE) {
    throw new UnexpectedEndOfStreamError(start, TRACK_CHUNK_HEADER_SIZE);
  }
  const chunkType = reader.readFourCC();
  const declaredLength = reader.readUint32();
  checkChunkType("MTrk", chunkType, start, strictChunkTypes, report, track);
  return { chunkType, declaredLength, dataOffset: reader.position };
}
