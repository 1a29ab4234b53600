// decoder.ts — one iteration of the track event state machine

import { NoRunningStatusError } from "./errors";
import { interpretMeta } from "./meta";
import type { ResolvedParseOptions } from "./options";
import { type ByteReader, readVariableLengthQuantity } from "./reader";
import type { ChannelEvent, MetaEvent, MidiEvent, SysExEvent } from "./types";

export const EventFamily = {
  noteOff: 0x8,
  noteOn: 0x9,
  noteAftertouch: 0xa,
  controller: 0xb,
  programChange: 0xc,
  channelAftertouch: 0xd,
  pitchBend: 0xe,
  system: 0xf,
} as const;

export const META_STATUS = 0xff;
export const SYSEX_START = 0xf0;
export const SYSEX_ESCAPE = 0xf7;

/** Carried across iterations of one track; reset for every track. */
export interface DecoderState {
  runningStatus: number | null;
}

export function createDecoderState(): DecoderState {
  return { runningStatus: null };
}

export type DecodeStep =
  | { kind: "event"; event: MidiEvent }
  | { kind: "statusError"; status: number; offset: number; delta: number };

export type DecodeOptions = Pick<
  ResolvedParseOptions,
  "normalizeZeroVelocityNoteOn" | "sysExFraming"
> & {
  decodeText: (bytes: Uint8Array) => string;
};

interface StatusContext {
  delta: number;
  offset: number;
  status: number;
  runningStatus: boolean;
}

/**
 * Decodes delta-time, status and payload of the next event.
 *
 * A status byte below 0x80 is a data byte under running status: it is pushed
 * back so the payload reader sees it first, and the last explicit status is
 * used instead.
 */
export function decodeEvent(
  reader: ByteReader,
  state: DecoderState,
  options: DecodeOptions,
): DecodeStep {
  const delta = readVariableLengthQuantity(reader);

  const offset = reader.position;
  let status = reader.readUint8();
  let runningStatus = false;

  if (status < 0x80) {
    if (state.runningStatus === null) {
      throw new NoRunningStatusError(offset, status);
    }
    reader.unreadUint8();
    status = state.runningStatus;
    runningStatus = true;
  } else {
    state.runningStatus = status;
  }

  const ctx: StatusContext = { delta, offset, status, runningStatus };
  const family = status >> 4;

  if (family !== EventFamily.system) {
    return { kind: "event", event: decodeChannelEvent(reader, ctx, options) };
  }

  switch (status) {
    case META_STATUS:
      return { kind: "event", event: decodeMetaEvent(reader, ctx, options) };
    case SYSEX_START:
    case SYSEX_ESCAPE:
      return {
        kind: "event",
        event: decodeSysExEvent(
          reader,
          ctx,
          status === SYSEX_START ? SYSEX_START : SYSEX_ESCAPE,
          options,
        ),
      };
    default:
      // Nothing beyond the status byte is consumed; the next iteration reads a delta-time.
      return { kind: "statusError", status, offset, delta };
  }
}

function decodeChannelEvent(
  reader: ByteReader,
  ctx: StatusContext,
  options: DecodeOptions,
): ChannelEvent {
  const channel = ctx.status & 0x0f;
  const base = { ...ctx, type: "channel" as const, channel };

  switch (ctx.status >> 4) {
    case EventFamily.noteOff:
      return {
        ...base,
        subtype: "noteOff",
        note: reader.readUint8(),
        velocity: reader.readUint8(),
      };

    case EventFamily.noteOn: {
      const note = reader.readUint8();
      const velocity = reader.readUint8();
      if (options.normalizeZeroVelocityNoteOn && velocity === 0) {
        return { ...base, subtype: "noteOff", note, velocity };
      }
      return { ...base, subtype: "noteOn", note, velocity };
    }

    case EventFamily.noteAftertouch:
      return {
        ...base,
        subtype: "noteAftertouch",
        note: reader.readUint8(),
        amount: reader.readUint8(),
      };

    case EventFamily.controller:
      return {
        ...base,
        subtype: "controller",
        controllerType: reader.readUint8(),
        value: reader.readUint8(),
      };

    case EventFamily.programChange:
      return { ...base, subtype: "programChange", program: reader.readUint8() };

    case EventFamily.channelAftertouch:
      return { ...base, subtype: "channelAftertouch", amount: reader.readUint8() };

    default: {
      // Only 0xE remains once 0x8-0xD and 0xF are excluded
      const lsb = reader.readUint8();
      const msb = reader.readUint8();
      return { ...base, subtype: "pitchBend", lsb, msb, value: (msb << 7) | lsb };
    }
  }
}

function decodeMetaEvent(
  reader: ByteReader,
  ctx: StatusContext,
  options: DecodeOptions,
): MetaEvent {
  const metaType = reader.readUint8();
  const length = readVariableLengthQuantity(reader);
  const data = reader.readBytes(length);

  return {
    ...ctx,
    type: "meta",
    metaType,
    length,
    data,
    payload: interpretMeta(metaType, data, options.decodeText),
  };
}

function decodeSysExEvent(
  reader: ByteReader,
  ctx: StatusContext,
  kind: typeof SYSEX_START | typeof SYSEX_ESCAPE,
  options: DecodeOptions,
): SysExEvent {
  if (options.sysExFraming === "reference") {
    reader.readUint8(); // type byte, discarded
  }
  const length = readVariableLengthQuantity(reader);
  const data = reader.readBytes(length);

  return { ...ctx, type: "sysex", kind, length, data };
}
