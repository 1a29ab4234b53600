// file.ts — reading an SMF from disk

import { readFile } from "node:fs/promises";
import { SourceReadError } from "./errors";
import { parseMidi } from "./midi";
import type { ParseOptions } from "./options";
import type { MidiEventListener, ParseResult } from "./types";

export async function readMidiFile(path: string): Promise<Uint8Array> {
  try {
    return await readFile(path);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SourceReadError(path, reason);
  }
}

export async function parseMidiFile(
  path: string,
  opts: ParseOptions = {},
  listener: MidiEventListener = {},
): Promise<ParseResult> {
  const bytes = await readMidiFile(path);
  return parseMidi(bytes, opts, listener);
}
