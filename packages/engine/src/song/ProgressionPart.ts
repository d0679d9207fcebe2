/**
 * Song parts backed by chord progressions.
 *
 * Chord tokens are either chord symbols ("Am7", "F#dim") or Roman
 * numerals ("IV", "vi7") resolved in the part's key. Chords are voiced
 * upward from their root in octave 3 (C3 = 48).
 */

import * as Tonal from "tonal";
import type { SongChord, SongPart } from "@antiphon/contracts";

import { ConfigurationError } from "../errors";

export const CHORD_OCTAVE = 3;

/** Beats a chord lasts when the song file gives no length. */
export const DEFAULT_CHORD_BEATS = 4;

/**
 * Resolve a Roman numeral to a chord symbol in `key`; chord symbols pass
 * through unchanged.
 */
export function resolveChordSymbol(chord: SongChord): string {
  if (Tonal.RomanNumeral.get(chord.symbol).empty) {
    return chord.symbol;
  }
  const [symbol] = Tonal.Progression.fromRomanNumerals(chord.key, [chord.symbol]);
  return symbol ?? chord.symbol;
}

/**
 * MIDI pitches of a chord symbol, root in `octave`, each further tone the
 * nearest one above the previous.
 */
export function chordToMidi(symbol: string, octave: number = CHORD_OCTAVE): number[] {
  const chord = Tonal.Chord.get(symbol);
  const root = chord.tonic ? Tonal.Note.midi(`${chord.tonic}${octave}`) : null;
  if (chord.empty || root === null) {
    throw new ConfigurationError(`Unknown chord '${symbol}'.`);
  }

  const pitches = [root];
  let previous = root;
  for (const name of chord.notes.slice(1)) {
    const chroma = Tonal.Note.get(name).chroma;
    if (chroma === undefined) continue;
    const step = (chroma - (previous % 12) + 12) % 12 || 12;
    previous += step;
    pitches.push(previous);
  }
  return pitches;
}

export class ProgressionPart implements SongPart {
  readonly name: string;
  readonly chords: readonly SongChord[];

  constructor(name: string, chords: readonly SongChord[] = []) {
    this.name = name;
    this.chords = chords;
  }

  getMidiChords(): number[][] {
    return this.chords.map((chord) => chordToMidi(resolveChordSymbol(chord)));
  }

  toString(): string {
    const chords = this.chords.map((c) => `${c.symbol}:${c.beats}`).join(", ");
    return `${this.name}(${chords})`;
  }
}
