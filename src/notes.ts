// notes.ts — per-track note-on/note-off sequences

import type { MidiEvent, Note } from "./types";

export function toNote(event: MidiEvent): Note | null {
  if (event.type !== "channel") return null;
  if (event.subtype === "noteOn") return { noteNumber: event.note, isOn: true };
  if (event.subtype === "noteOff") return { noteNumber: event.note, isOn: false };
  return null;
}

/**
 * Accumulates notes in decode order, one sequence per track. Nothing is
 * merged, deduplicated or timestamped.
 */
export class NoteCollector {
  private readonly tracks: Note[][] = [];
  private current: Note[] | null = null;

  beginTrack(index: number): Note[] {
    const notes: Note[] = [];
    this.tracks[index] = notes;
    this.current = notes;
    return notes;
  }

  collect(event: MidiEvent): Note | null {
    const note = toNote(event);
    if (note === null) return null;
    if (this.current === null) {
      throw new Error("NoteCollector.collect called before beginTrack");
    }
    this.current.push(note);
    return note;
  }

  toArray(): Note[][] {
    return this.tracks.map((notes) => [...notes]);
  }
}
