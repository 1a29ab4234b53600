export {
  createDecoderState,
  type DecodeOptions,
  type DecoderState,
  type DecodeStep,
  decodeEvent,
  EventFamily,
  META_STATUS,
  SYSEX_ESCAPE,
  SYSEX_START,
} from "./decoder";
export {
  InvalidChunkTypeError,
  InvalidOptionsError,
  isTrackScopedError,
  type MidiErrorCode,
  MidiParseError,
  NoRunningStatusError,
  PushbackError,
  SourceReadError,
  StatusByteError,
  TrackOverrunError,
  TruncatedHeaderError,
  UnexpectedEndOfStreamError,
} from "./errors";
export { parseMidiFile, readMidiFile } from "./file";
export {
  decodeTimeDivision,
  HEADER_CHUNK_SIZE,
  readHeader,
  readTrackChunk,
  TRACK_CHUNK_HEADER_SIZE,
} from "./header";
export { decodeLatin1, interpretMeta, MetaType, tempoToBpm } from "./meta";
export { MidiParser, parseMidi } from "./midi";
export { NoteCollector, toNote } from "./notes";
export {
  type ParseOptions,
  ParseOptionsSchema,
  type ResolvedParseOptions,
  resolveParseOptions,
} from "./options";
export {
  type ByteInput,
  ByteReader,
  decodeVariableLengthQuantity,
  readVariableLengthQuantity,
} from "./reader";
export {
  type ConsoleReporterOptions,
  createConsoleReporter,
  formatDiagnostic,
  formatEvent,
} from "./report";
export type * from "./types";
