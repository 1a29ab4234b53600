// midi.ts — Standard MIDI File decoder: header, track chunks and note extraction

import { createDecoderState, type DecodeOptions, decodeEvent } from "./decoder";
import { isTrackScopedError, StatusByteError, TrackOverrunError } from "./errors";
import { readHeader, readTrackChunk } from "./header";
import { decodeLatin1 } from "./meta";
import { NoteCollector } from "./notes";
import { type ParseOptions, type ResolvedParseOptions, resolveParseOptions } from "./options";
import { type ByteInput, ByteReader } from "./reader";
import type {
  Diagnostic,
  MidiEvent,
  MidiEventListener,
  MidiHeader,
  ParseResult,
  TrackChunkDescriptor,
  TrackResult,
} from "./types";

export class MidiParser {
  private readonly reader: ByteReader;
  private readonly opts: ResolvedParseOptions;
  private readonly decodeOptions: DecodeOptions;
  private readonly notes = new NoteCollector();
  private readonly diagnostics: Diagnostic[] = [];

  constructor(
    input: ByteInput,
    options: ParseOptions = {},
    private readonly listener: MidiEventListener = {},
  ) {
    this.reader = new ByteReader(input);
    this.opts = resolveParseOptions(options);

    let decodeText = decodeLatin1;
    if (this.opts.textEncoding !== "latin1") {
      const textDecoder = new TextDecoder(this.opts.textEncoding);
      decodeText = (bytes) => textDecoder.decode(bytes);
    }
    this.decodeOptions = {
      normalizeZeroVelocityNoteOn: this.opts.normalizeZeroVelocityNoteOn,
      sysExFraming: this.opts.sysExFraming,
      decodeText,
    };
  }

  private report(diagnostic: Diagnostic) {
    this.diagnostics.push(diagnostic);
    this.listener.onDiagnostic?.(diagnostic);
  }

  private parseTrack(index: number, chunk: TrackChunkDescriptor): TrackResult {
    const declaredEnd = chunk.dataOffset + chunk.declaredLength;
    const strictLength = this.opts.trackLengthMode === "strict";
    const state = createDecoderState();
    const events: MidiEvent[] = [];
    const notes = this.notes.beginTrack(index);
    const result: TrackResult = { index, chunk, events, notes, endOfTrack: false };

    this.listener.onTrackStart?.(chunk, index);

    try {
      while (!this.reader.isAtEnd) {
        if (strictLength && this.reader.position >= declaredEnd) break;

        const step = decodeEvent(this.reader, state, this.decodeOptions);
        if (strictLength && this.reader.position > declaredEnd) {
          const start = step.kind === "event" ? step.event.offset : step.offset;
          throw new TrackOverrunError(start, declaredEnd);
        }

        if (step.kind === "statusError") {
          const error = new StatusByteError(step.offset, step.status);
          this.report({
            level: "warning",
            code: error.code,
            message: error.message,
            track: index,
            offset: step.offset,
          });
          continue;
        }

        const event = step.event;
        events.push(event);
        this.notes.collect(event);
        this.listener.onEvent?.(event, index);

        if (event.type === "meta" && event.payload.kind === "endOfTrack") {
          result.endOfTrack = true;
          break;
        }
      }
    } catch (error) {
      if (!isTrackScopedError(error)) throw error;
      result.error = error;
      this.report({
        level: "error",
        code: error.code,
        message: `Track ${index}: ${error.message}`,
        track: index,
        ...(error.offset === null ? {} : { offset: error.offset }),
      });
    }

    if (!result.endOfTrack && result.error === undefined) {
      this.report({
        level: "warning",
        code: "MISSING_END_OF_TRACK",
        message: `Track ${index} ended without an end-of-track event`,
        track: index,
        offset: this.reader.position,
      });
    }

    if (strictLength && declaredEnd <= this.reader.length) {
      this.reader.seek(declaredEnd);
    }

    this.listener.onTrackEnd?.(result);
    return result;
  }

  /**
   * After a failed track the cursor sits somewhere inside it; the declared
   * chunk end is the only known resync point.
   */
  private resync(index: number, chunk: TrackChunkDescriptor, failedAt: number): boolean {
    const declaredEnd = chunk.dataOffset + chunk.declaredLength;
    if (declaredEnd >= failedAt && declaredEnd < this.reader.length) {
      this.reader.seek(declaredEnd);
      return true;
    }
    this.reportTracksSkipped(index);
    return false;
  }

  private reportTracksSkipped(index: number) {
    this.report({
      level: "error",
      code: "TRACKS_SKIPPED",
      message: `Cannot resume after track ${index}; remaining tracks were not decoded`,
      track: index,
    });
  }

  parse(): ParseResult {
    const header: MidiHeader = readHeader(
      this.reader,
      this.opts.strictChunkTypes,
      (d) => this.report(d),
    );

    const tracks: TrackResult[] = [];
    for (let i = 0; i < header.trackCount; i++) {
      // A track that ran to the end of the source without end-of-track took the rest of it
      const previous = tracks[tracks.length - 1];
      if (previous !== undefined && !previous.endOfTrack && this.reader.isAtEnd) {
        this.reportTracksSkipped(previous.index);
        break;
      }

      const chunk = readTrackChunk(
        this.reader,
        i,
        this.opts.strictChunkTypes,
        (d) => this.report(d),
      );
      const track = this.parseTrack(i, chunk);
      tracks.push(track);

      if (track.error !== undefined && i + 1 < header.trackCount) {
        if (!this.resync(i, chunk, this.reader.position)) break;
      }
    }

    return {
      header,
      tracks,
      notes: this.notes.toArray(),
      diagnostics: [...this.diagnostics],
    };
  }
}

export function parseMidi(
  input: ByteInput,
  opts: ParseOptions = {},
  listener: MidiEventListener = {},
): ParseResult {
  const parser = new MidiParser(input, opts, listener);
  return parser.parse();
}
