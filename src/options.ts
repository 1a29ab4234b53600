// options.ts — parse options, validated with zod

import { z } from "zod";
import { InvalidOptionsError } from "./errors";

const isSupportedEncoding = (label: string): boolean => {
  try {
    new TextDecoder(label);
    return true;
  } catch {
    return false;
  }
};

export const ParseOptionsSchema = z
  .object({
    /** Throw on an MThd/MTrk tag mismatch instead of reporting a warning. */
    strictChunkTypes: z.boolean().default(false),
    /**
     * "ignore": a track ends only at end-of-track or when the source runs out.
     * "strict": the declared chunk length is also a hard stop.
     */
    trackLengthMode: z.enum(["ignore", "strict"]).default("ignore"),
    normalizeZeroVelocityNoteOn: z.boolean().default(false),
    /**
     * "reference": F0/F7 are followed by a discarded type byte, then the length.
     * "standard": the length follows the status byte directly.
     */
    sysExFraming: z.enum(["reference", "standard"]).default("reference"),
    /**
     * "latin1" maps bytes 1:1 onto U+0000-U+00FF. Any other label goes through
     * TextDecoder, which treats "iso-8859-1" as windows-1252.
     */
    textEncoding: z
      .string()
      .min(1)
      .refine(isSupportedEncoding, "not a TextDecoder encoding label")
      .default("latin1"),
  })
  .strict();

export type ParseOptions = z.input<typeof ParseOptionsSchema>;
export type ResolvedParseOptions = z.output<typeof ParseOptionsSchema>;

export function resolveParseOptions(options: unknown = {}): ResolvedParseOptions {
  const result = ParseOptionsSchema.safeParse(options);
  if (result.success) return result.data;

  throw new InvalidOptionsError(
    result.error.issues.map(
      (issue) => `${issue.path.join(".") || "root"}: ${issue.message}`,
    ),
  );
}
