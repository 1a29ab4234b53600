#!/usr/bin/env node
// ─── smf: print the events and notes of a Standard MIDI File ───────────────
//
// Usage:
//   smf <file.mid>                  # Event report + note counts per track
//   smf <file.mid> --json           # Notes per track as JSON
//   smf <file.mid> --quiet          # Note counts only
//   smf <file.mid> --strict         # Chunk tags must be MThd/MTrk
//   smf <file.mid> --strict-length  # Declared track lengths are hard stops
//   smf <file.mid> --zero-velocity-off
//   smf <file.mid> --standard-sysex
//   smf <file.mid> --encoding utf-8
// ───────────────────────────────────────────────────────────────────────────

import { pathToFileURL } from "node:url";
import { MidiParseError } from "./errors";
import { parseMidiFile } from "./file";
import type { ParseOptions } from "./options";
import { createConsoleReporter } from "./report";
import type { MidiEventListener } from "./types";

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const USAGE =
  "Usage: smf <file.mid> [--json] [--quiet] [--strict] [--strict-length] " +
  "[--zero-velocity-off] [--standard-sysex] [--encoding <label>]";

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1] ?? null;
}

/** Returns the process exit code: 0 ok, 1 usage or fatal error, 2 a track failed. */
export async function runCli(args: string[], io: CliIO = consoleIO): Promise<number> {
  const encoding = getFlag(args, "--encoding");
  const positional = args.filter(
    (arg, i) => !arg.startsWith("--") && args[i - 1] !== "--encoding",
  );
  const file = positional[0];

  if (args.includes("--help") || args.includes("-h")) {
    io.out(USAGE);
    return 0;
  }
  if (file === undefined) {
    io.err(USAGE);
    return 1;
  }

  const json = args.includes("--json");
  const quiet = args.includes("--quiet") || json;

  const options: ParseOptions = {
    strictChunkTypes: args.includes("--strict"),
    trackLengthMode: args.includes("--strict-length") ? "strict" : "ignore",
    normalizeZeroVelocityNoteOn: args.includes("--zero-velocity-off"),
    sysExFraming: args.includes("--standard-sysex") ? "standard" : "reference",
    ...(encoding === null ? {} : { textEncoding: encoding }),
  };

  try {
    const listener: MidiEventListener = quiet ? {} : createConsoleReporter({ write: io.out });
    const result = await parseMidiFile(file, options, listener);

    if (json) {
      io.out(JSON.stringify(result.notes));
    } else {
      io.out(`${result.header.trackCount} track(s) declared, ${result.tracks.length} decoded`);
      for (const track of result.tracks) {
        const status = track.error ? `failed: ${track.error.message}` : "ok";
        io.out(`track ${track.index}: ${track.notes.length} notes (${status})`);
      }
    }

    return result.tracks.some((t) => t.error !== undefined) ? 2 : 0;
  } catch (error) {
    if (error instanceof MidiParseError) {
      io.err(`error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    },
  );
}
