// meta.ts — payload interpreters for FF-prefixed meta-events

import type { MetaPayload, TextMetaType } from "./types";

export const MetaType = {
  sequenceNumber: 0x00,
  text: 0x01,
  copyright: 0x02,
  trackName: 0x03,
  instrumentName: 0x04,
  lyrics: 0x05,
  marker: 0x06,
  cuePoint: 0x07,
  channelPrefix: 0x20,
  endOfTrack: 0x2f,
  setTempo: 0x51,
  smpteOffset: 0x54,
  timeSignature: 0x58,
  keySignature: 0x59,
  sequencerSpecific: 0x7f,
} as const;

const TEXT_TYPES: Record<number, TextMetaType> = {
  [MetaType.text]: "text",
  [MetaType.copyright]: "copyright",
  [MetaType.trackName]: "trackName",
  [MetaType.instrumentName]: "instrumentName",
  [MetaType.lyrics]: "lyrics",
  [MetaType.marker]: "marker",
  [MetaType.cuePoint]: "cuePoint",
};

// Minimum payload sizes of the fixed-layout meta-events
const FIXED_LENGTHS: Record<number, number> = {
  [MetaType.sequenceNumber]: 2,
  [MetaType.channelPrefix]: 1,
  [MetaType.setTempo]: 3,
  [MetaType.smpteOffset]: 5,
  [MetaType.timeSignature]: 4,
  [MetaType.keySignature]: 2,
};

export const MICROSECONDS_PER_MINUTE = 60_000_000;

export function tempoToBpm(microsecondsPerQuarter: number): number {
  return MICROSECONDS_PER_MINUTE / microsecondsPerQuarter;
}

/** Maps each byte to the code point of the same value (ISO-8859-1). */
export function decodeLatin1(bytes: Uint8Array): string {
  let s = "";
  for (const byte of bytes) s += String.fromCharCode(byte);
  return s;
}

const toSignedByte = (value: number): number => (value > 127 ? value - 256 : value);

/**
 * Interprets the raw payload of a meta-event. The caller has already
 * consumed exactly `data.length` bytes, so the cursor stays aligned no
 * matter what this returns.
 */
export function interpretMeta(
  metaType: number,
  data: Uint8Array,
  decodeText: (bytes: Uint8Array) => string,
): MetaPayload {
  const textType = TEXT_TYPES[metaType];
  if (textType !== undefined) {
    return { kind: "text", textType, text: decodeText(data) };
  }

  const expectedLength = FIXED_LENGTHS[metaType];
  if (expectedLength !== undefined && data.length < expectedLength) {
    return { kind: "malformed", metaType, data, expectedLength };
  }

  const byte = (i: number): number => data[i] ?? 0;

  switch (metaType) {
    case MetaType.sequenceNumber:
      return {
        kind: "sequenceNumber",
        msb: byte(0),
        lsb: byte(1),
        number: (byte(0) << 8) | byte(1),
      };

    case MetaType.channelPrefix:
      return { kind: "channelPrefix", channel: byte(0) };

    case MetaType.endOfTrack:
      return { kind: "endOfTrack" };

    case MetaType.setTempo: {
      const microsecondsPerQuarter = (byte(0) << 16) | (byte(1) << 8) | byte(2);
      if (microsecondsPerQuarter === 0) {
        return { kind: "malformed", metaType, data, expectedLength: 3 };
      }
      return {
        kind: "setTempo",
        microsecondsPerQuarter,
        bpm: tempoToBpm(microsecondsPerQuarter),
      };
    }

    case MetaType.smpteOffset:
      return {
        kind: "smpteOffset",
        hour: byte(0),
        minute: byte(1),
        second: byte(2),
        frame: byte(3),
        subFrame: byte(4),
      };

    case MetaType.timeSignature:
      return {
        kind: "timeSignature",
        numerator: byte(0),
        denominatorPower: byte(1),
        denominator: 2 ** byte(1),
        metronomeClocks: byte(2),
        thirtySecondNotesPerQuarter: byte(3),
      };

    case MetaType.keySignature:
      return {
        kind: "keySignature",
        sharpsFlats: toSignedByte(byte(0)),
        minor: byte(1) === 1,
      };

    case MetaType.sequencerSpecific:
      return { kind: "sequencerSpecific", data };

    default:
      return { kind: "unknown", metaType, data };
  }
}
