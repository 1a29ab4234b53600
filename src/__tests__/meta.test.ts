import { describe, expect, it } from "vitest";
import { decodeLatin1, interpretMeta, type MetaEvent, MetaType, parseMidi, tempoToBpm } from "../index";
import {
  createKeySignatureEvent,
  createSingleTrackMidi,
  createTempoEvent,
  metaEvent,
  textBytes,
} from "./test-utils";

const interpret = (metaType: number, data: number[]) =>
  interpretMeta(metaType, new Uint8Array(data), decodeLatin1);

function metaEvents(events: number[]): MetaEvent[] {
  const midi = parseMidi(createSingleTrackMidi(events));
  return (midi.tracks[0]?.events ?? []).filter((e): e is MetaEvent => e.type === "meta");
}

describe("Meta Events", () => {
  it("should decode a sequence number from two bytes", () => {
    expect(interpret(MetaType.sequenceNumber, [0x01, 0x02])).toEqual({
      kind: "sequenceNumber",
      msb: 1,
      lsb: 2,
      number: 258,
    });
  });

  it("should decode each text-like meta type", () => {
    const kinds = [
      [0x01, "text"],
      [0x02, "copyright"],
      [0x03, "trackName"],
      [0x04, "instrumentName"],
      [0x05, "lyrics"],
      [0x06, "marker"],
      [0x07, "cuePoint"],
    ] as const;

    for (const [metaType, textType] of kinds) {
      expect(interpret(metaType, textBytes("Piano"))).toEqual({ kind: "text", textType, text: "Piano" });
    }
  });

  it("should map text bytes one-to-one onto code points by default", () => {
    const [event] = metaEvents(metaEvent(0x03, [0x43, 0x61, 0x66, 0xe9, 0x80]));
    expect(event?.payload).toEqual({ kind: "text", textType: "trackName", text: "Café\u0080" });
  });

  it("should decode through TextDecoder for other labels", () => {
    const midi = parseMidi(createSingleTrackMidi(metaEvent(0x01, [0x80])), { textEncoding: "windows-1252" });
    expect(midi.tracks[0]?.events[0]).toMatchObject({ payload: { kind: "text", text: "\u20ac" } });
  });

  it("should decode text with the configured encoding", () => {
    const midi = parseMidi(createSingleTrackMidi(metaEvent(0x05, [0x43, 0x61, 0x66, 0xc3, 0xa9])), {
      textEncoding: "utf-8",
    });
    expect(midi.tracks[0]?.events[0]).toMatchObject({
      payload: { kind: "text", textType: "lyrics", text: "Café" },
    });
  });

  it("should decode the MIDI channel prefix", () => {
    expect(interpret(MetaType.channelPrefix, [0x09])).toEqual({ kind: "channelPrefix", channel: 9 });
  });

  describe("Set Tempo", () => {
    it("should combine all three bytes and derive 120 BPM from 500000", () => {
      expect(interpret(MetaType.setTempo, [0x07, 0xa1, 0x20])).toEqual({
        kind: "setTempo",
        microsecondsPerQuarter: 500000,
        bpm: 120,
      });
    });

    it("should fold the low byte into the value", () => {
      // 0x06 0x1A 0x80 = 400000, so the low byte 0x80 has to be part of the value
      expect(interpret(MetaType.setTempo, createTempoEvent(400000))).toMatchObject({
        microsecondsPerQuarter: 400000,
        bpm: 150,
      });
    });

    it("should treat a zero tempo as malformed", () => {
      expect(interpret(MetaType.setTempo, [0, 0, 0])).toMatchObject({ kind: "malformed", expectedLength: 3 });
    });

    it("should compute BPM from microseconds per quarter", () => {
      expect(tempoToBpm(600000)).toBe(100);
    });
  });

  it("should decode an SMPTE offset", () => {
    expect(interpret(MetaType.smpteOffset, [1, 2, 3, 4, 5])).toEqual({
      kind: "smpteOffset",
      hour: 1,
      minute: 2,
      second: 3,
      frame: 4,
      subFrame: 5,
    });
  });

  it("should decode a time signature", () => {
    expect(interpret(MetaType.timeSignature, [6, 3, 24, 8])).toEqual({
      kind: "timeSignature",
      numerator: 6,
      denominatorPower: 3,
      denominator: 8,
      metronomeClocks: 24,
      thirtySecondNotesPerQuarter: 8,
    });
  });

  it("should decode key signatures with negative sharps/flats", () => {
    expect(interpret(MetaType.keySignature, createKeySignatureEvent(-3, true))).toEqual({
      kind: "keySignature",
      sharpsFlats: -3,
      minor: true,
    });
    expect(interpret(MetaType.keySignature, createKeySignatureEvent(2))).toEqual({
      kind: "keySignature",
      sharpsFlats: 2,
      minor: false,
    });
  });

  it("should keep sequencer-specific data opaque", () => {
    const payload = interpret(MetaType.sequencerSpecific, [0x00, 0x00, 0x41]);
    expect(payload.kind).toBe("sequencerSpecific");
    if (payload.kind === "sequencerSpecific") {
      expect(Array.from(payload.data)).toEqual([0x00, 0x00, 0x41]);
    }
  });

  it("should mark fixed-layout events with too short a payload as malformed", () => {
    expect(interpret(MetaType.timeSignature, [4, 2])).toMatchObject({
      kind: "malformed",
      metaType: 0x58,
      expectedLength: 4,
    });
  });

  it("should ignore extra payload bytes of fixed-layout events", () => {
    expect(interpret(MetaType.channelPrefix, [0x02, 0x7f])).toEqual({ kind: "channelPrefix", channel: 2 });
  });

  describe("Unknown meta types", () => {
    it("should return the raw bytes", () => {
      const payload = interpret(0x60, [1, 2, 3, 4, 5]);
      expect(payload).toMatchObject({ kind: "unknown", metaType: 0x60 });
    });

    it("should advance the cursor by exactly the declared length", () => {
      const events = [...metaEvent(0x60, [0x90, 0x3c, 0x40, 0xff, 0x2f]), 0x00, 0x90, 0x3e, 0x40];
      const midi = parseMidi(createSingleTrackMidi(events));
      const track = midi.tracks[0];

      expect(track?.events.map((e) => e.type)).toEqual(["meta", "channel", "meta"]);
      expect(track?.events[1]).toMatchObject({ subtype: "noteOn", note: 62, offset: 32 });
      expect(track?.notes).toEqual([{ noteNumber: 62, isOn: true }]);
    });
  });

  it("should end the track at end-of-track even with a non-zero length", () => {
    const midi = parseMidi(createSingleTrackMidi(metaEvent(MetaType.endOfTrack, [0x01])));
    const track = midi.tracks[0];
    expect(track?.events).toHaveLength(1);
    expect(track?.events[0]).toMatchObject({ type: "meta", metaType: 0x2f, length: 1 });
    expect(track?.endOfTrack).toBe(true);
  });
});
