// report.ts — one human-readable line per decoded event

import type {
  ChannelEvent,
  Diagnostic,
  MetaPayload,
  MidiEvent,
  MidiEventListener,
  TrackResult,
} from "./types";

const hex = (value: number): string => `0x${value.toString(16).padStart(2, "0")}`;

const hexBytes = (data: Uint8Array): string =>
  Array.from(data, (b) => b.toString(16).padStart(2, "0")).join(" ");

function formatChannelEvent(event: ChannelEvent): string {
  const head = `${event.subtype} ch=${event.channel}`;
  switch (event.subtype) {
    case "noteOff":
    case "noteOn":
      return `${head} note=${event.note} velocity=${event.velocity} delta=${event.delta}`;
    case "noteAftertouch":
      return `${head} note=${event.note} amount=${event.amount}`;
    case "controller":
      return `${head} controller=${event.controllerType} value=${event.value}`;
    case "programChange":
      return `${head} program=${event.program}`;
    case "channelAftertouch":
      return `${head} amount=${event.amount}`;
    case "pitchBend":
      return `${head} lsb=${event.lsb} msb=${event.msb} value=${event.value}`;
  }
}

function formatMetaPayload(payload: MetaPayload): string {
  switch (payload.kind) {
    case "sequenceNumber":
      return `sequenceNumber msb=${payload.msb} lsb=${payload.lsb}`;
    case "text":
      return `${payload.textType} text=${JSON.stringify(payload.text)}`;
    case "channelPrefix":
      return `channelPrefix channel=${payload.channel}`;
    case "endOfTrack":
      return "endOfTrack";
    case "setTempo":
      return `setTempo mspqn=${payload.microsecondsPerQuarter} bpm=${Number(payload.bpm.toFixed(3))}`;
    case "smpteOffset":
      return `smpteOffset ${payload.hour}:${payload.minute}:${payload.second} frame=${payload.frame} subFrame=${payload.subFrame}`;
    case "timeSignature":
      return `timeSignature ${payload.numerator}/${payload.denominator} metronome=${payload.metronomeClocks} thirtySeconds=${payload.thirtySecondNotesPerQuarter}`;
    case "keySignature":
      return `keySignature sharpsFlats=${payload.sharpsFlats} ${payload.minor ? "minor" : "major"}`;
    case "sequencerSpecific":
      return `sequencerSpecific bytes=${payload.data.length}`;
    case "unknown":
      return `meta ${hex(payload.metaType)} bytes=${payload.data.length}`;
    case "malformed":
      return `meta ${hex(payload.metaType)} malformed: expected ${payload.expectedLength} bytes [${hexBytes(payload.data)}]`;
  }
}

export function formatEvent(event: MidiEvent): string {
  switch (event.type) {
    case "channel":
      return formatChannelEvent(event);
    case "meta":
      return formatMetaPayload(event.payload);
    case "sysex":
      return `sysex ${hex(event.kind)} bytes=${event.length}`;
  }
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = diagnostic.offset === undefined ? "" : ` @${hex(diagnostic.offset)}`;
  return `${diagnostic.level.toUpperCase()} ${diagnostic.code}${where}: ${diagnostic.message}`;
}

export interface ConsoleReporterOptions {
  write?: (line: string) => void;
}

/** Listener that narrates the decode: a banner per track, one line per event. */
export function createConsoleReporter(
  options: ConsoleReporterOptions = {},
): MidiEventListener {
  const write = options.write ?? ((line: string) => console.log(line));

  return {
    onTrackStart(chunk, track) {
      write(`--- track ${track} (${chunk.declaredLength} bytes declared) ---`);
    },
    onEvent(event) {
      write(formatEvent(event));
    },
    onDiagnostic(diagnostic) {
      write(formatDiagnostic(diagnostic));
    },
    onTrackEnd(result: TrackResult) {
      write(`--- track ${result.index}: ${result.events.length} events, ${result.notes.length} notes ---`);
    },
  };
}
