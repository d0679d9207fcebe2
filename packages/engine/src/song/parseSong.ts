/**
 * Song file parsing.
 *
 * One part per line: `name, chord, chord, ...`. A chord token may carry a
 * length in beats (`Am:2`). A part name that repeats with no chords reuses
 * the chords it was first given. Blank lines and `#` comments are skipped.
 *
 *   # verse/chorus in G
 *   verse, I, vi, IV, V
 *   chorus, C, D:2, Em:2, G
 *   verse
 */

import type { Song, SongChord } from "@antiphon/contracts";

import { ConfigurationError } from "../errors";
import { DEFAULT_CHORD_BEATS, ProgressionPart, chordToMidi, resolveChordSymbol } from "./ProgressionPart";

export interface ParseSongOptions {
  /**
   * Key Roman numerals are resolved in.
   * @default "C"
   */
  key?: string;
}

function parseChord(token: string, key: string, lineNumber: number): SongChord {
  const [symbol, beatsText] = token.split(":").map((s) => s.trim());
  const beats = beatsText === undefined ? DEFAULT_CHORD_BEATS : Number(beatsText);
  if (!symbol || !Number.isFinite(beats) || beats <= 0) {
    throw new ConfigurationError(`Line ${lineNumber}: invalid chord '${token}'.`);
  }

  const chord: SongChord = { symbol, key, beats };
  try {
    chordToMidi(resolveChordSymbol(chord));
  } catch (err) {
    throw new ConfigurationError(
      `Line ${lineNumber}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return chord;
}

export function parseSong(text: string, options: ParseSongOptions = {}): Song {
  const key = options.key ?? "C";
  const parts: ProgressionPart[] = [];
  const partsByName: Map<string, ProgressionPart> = new Map();

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.replace(/#.*$/, "").trim();
    if (!line) return;

    const [name, ...tokens] = line.split(",").map((s) => s.trim());
    if (!name) {
      throw new ConfigurationError(`Line ${index + 1}: missing part name.`);
    }
    const chords = tokens.filter(Boolean).map((token) => parseChord(token, key, index + 1));

    const earlier = partsByName.get(name);
    const part = chords.length === 0 && earlier ? earlier : new ProgressionPart(name, chords);
    parts.push(part);
    partsByName.set(name, part);
  });

  return parts;
}
