/**
 * Song Structure Types
 *
 * A song is an ordered list of named parts. Repeated part names share
 * generated material during a performance.
 */

export interface SongChord {
  /** Chord symbol ("Am7") or Roman numeral ("IV"). */
  symbol: string;
  /** Key a Roman numeral is resolved in. */
  key: string;
  /** Length in beats. */
  beats: number;
}

export interface SongPart {
  readonly name: string;
  readonly chords: readonly SongChord[];
  /** MIDI pitches of every chord, in order. */
  getMidiChords(): number[][];
}

export type Song = readonly SongPart[];
