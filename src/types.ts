// types.ts — decoded SMF data model

export type TimeDivision =
  | { type: "ppq"; ticksPerQuarter: number }
  | { type: "smpte"; framesPerSecond: number; ticksPerFrame: number };

export interface MidiHeader {
  chunkType: string;
  declaredLength: number;
  /** Normally 0, 1 or 2; other values are kept as read. */
  format: number;
  trackCount: number;
  timeDivision: number;
  division: TimeDivision;
}

export interface TrackChunkDescriptor {
  chunkType: string;
  declaredLength: number;
  /** Offset of the first byte after the 8-byte chunk header. */
  dataOffset: number;
}

interface EventBase {
  delta: number;
  /** Offset of the status byte, or of the first data byte under running status. */
  offset: number;
  /** Effective status byte. */
  status: number;
  runningStatus: boolean;
}

export type ChannelEvent = EventBase & { type: "channel"; channel: number } & (
    | { subtype: "noteOff"; note: number; velocity: number }
    | { subtype: "noteOn"; note: number; velocity: number }
    | { subtype: "noteAftertouch"; note: number; amount: number }
    | { subtype: "controller"; controllerType: number; value: number }
    | { subtype: "programChange"; program: number }
    | { subtype: "channelAftertouch"; amount: number }
    | { subtype: "pitchBend"; lsb: number; msb: number; value: number } // value = (msb << 7) | lsb
  );

export type TextMetaType =
  | "text"
  | "copyright"
  | "trackName"
  | "instrumentName"
  | "lyrics"
  | "marker"
  | "cuePoint";

export type MetaPayload =
  | { kind: "sequenceNumber"; msb: number; lsb: number; number: number }
  | { kind: "text"; textType: TextMetaType; text: string }
  | { kind: "channelPrefix"; channel: number }
  | { kind: "endOfTrack" }
  | { kind: "setTempo"; microsecondsPerQuarter: number; bpm: number }
  | {
      kind: "smpteOffset";
      hour: number;
      minute: number;
      second: number;
      frame: number;
      subFrame: number;
    }
  | {
      kind: "timeSignature";
      numerator: number;
      denominatorPower: number;
      denominator: number;
      metronomeClocks: number;
      thirtySecondNotesPerQuarter: number;
    }
  | { kind: "keySignature"; sharpsFlats: number; minor: boolean }
  | { kind: "sequencerSpecific"; data: Uint8Array }
  | { kind: "unknown"; metaType: number; data: Uint8Array }
  | { kind: "malformed"; metaType: number; data: Uint8Array; expectedLength: number };

export interface MetaEvent extends EventBase {
  type: "meta";
  metaType: number;
  length: number;
  data: Uint8Array;
  payload: MetaPayload;
}

export interface SysExEvent extends EventBase {
  type: "sysex";
  kind: 0xf0 | 0xf7;
  length: number;
  data: Uint8Array;
}

export type MidiEvent = ChannelEvent | MetaEvent | SysExEvent;

export interface Note {
  noteNumber: number;
  isOn: boolean;
}

export type DiagnosticLevel = "warning" | "error";

export interface Diagnostic {
  level: DiagnosticLevel;
  code: string;
  message: string;
  /** Track index, absent for file-level diagnostics. */
  track?: number;
  offset?: number;
}

export interface TrackResult {
  index: number;
  chunk: TrackChunkDescriptor;
  events: MidiEvent[];
  notes: Note[];
  /** False when the track stopped without an end-of-track meta-event. */
  endOfTrack: boolean;
  error?: Error;
}

export interface ParseResult {
  header: MidiHeader;
  tracks: TrackResult[];
  /** One note sequence per decoded track, in decode order. */
  notes: Note[][];
  diagnostics: Diagnostic[];
}

export interface MidiEventListener {
  onTrackStart?(chunk: TrackChunkDescriptor, track: number): void;
  onEvent?(event: MidiEvent, track: number): void;
  onDiagnostic?(diagnostic: Diagnostic): void;
  onTrackEnd?(result: TrackResult): void;
}
