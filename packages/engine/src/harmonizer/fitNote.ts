/**
 * Note Fitting
 *
 * Maps an incoming note onto the tones of the current chord, spread over
 * the whole keyboard and merged with the C major scale.
 *
 * The input is lifted into the melody register, then its signed distance
 * from the melodic center picks a rank in one of two sorted sets: the
 * tones below the chord's middle octaves, or those from there up. Index
 * lookup in a sorted array keeps each fit O(1) once the lattice exists.
 */

const MAJOR_SCALE = [0, 2, 4, 5, 7, 9, 11];

/** C of every octave in the MIDI range */
const OCTAVE_ROOTS: readonly number[] = Array.from({ length: 11 }, (_, i) => i * 12);

const MAJOR_NOTES: readonly number[][] = OCTAVE_ROOTS.map((root) =>
  MAJOR_SCALE.map((degree) => degree + root)
);

/** Input is lifted this far before measuring its distance to the center */
const REGISTER_SHIFT = 36;

/** Octaves [0, 4) form the lower set, the rest the upper set */
const MIDDLE_OCTAVE_CHORDS = 4;

const MELODY_CENTER = OCTAVE_ROOTS[8];

export interface NoteLattice {
  /** Sorted tones of the lower octaves */
  below: readonly number[];
  /** Sorted tones from the middle octave up; may run past 127 */
  above: readonly number[];
}

function sortedUnique(values: Iterable<number>): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}

/**
 * Build the fitting lattice for a non-empty chord.
 */
export function buildLattice(chord: readonly number[]): NoteLattice {
  // Number of whole octaves to drop the chord into octave zero.
  let lowest = Math.min(...chord);
  let count = -1;
  while (lowest >= 0) {
    count++;
    lowest -= 12;
  }

  const mapped = OCTAVE_ROOTS.map((root) => chord.map((pitch) => pitch - 12 * count + root));

  return {
    below: sortedUnique([
      ...mapped.slice(0, MIDDLE_OCTAVE_CHORDS).flat(),
      ...MAJOR_NOTES.slice(0, MIDDLE_OCTAVE_CHORDS).flat(),
    ]),
    above: sortedUnique([
      ...mapped.slice(MIDDLE_OCTAVE_CHORDS).flat(),
      ...MAJOR_NOTES.slice(MIDDLE_OCTAVE_CHORDS).flat(),
    ]),
  };
}

/**
 * Fit `note` to `chord`. An empty chord leaves the note unchanged; the
 * result is always within [0, 127].
 */
export function fitNote(note: number, chord: readonly number[], lattice?: NoteLattice): number {
  if (chord.length === 0) return note;

  const { below, above } = lattice ?? buildLattice(chord);
  const lifted = note + REGISTER_SHIFT;
  const diff = Math.max(-below.length, Math.min(lifted - MELODY_CENTER, above.length - 1));
  const fitted = diff < 0 ? below[below.length + diff] : above[diff];
  return Math.max(0, Math.min(fitted, 127));
}

/**
 * `fitNote` with the lattice of the last chord kept between calls.
 */
export class NoteFitter {
  private chordKey = "";
  private lattice: NoteLattice | null = null;

  fit(note: number, chord: readonly number[]): number {
    if (chord.length === 0) return note;

    const key = [...chord].sort((a, b) => a - b).join(",");
    if (!this.lattice || key !== this.chordKey) {
      this.lattice = buildLattice(chord);
      this.chordKey = key;
    }
    return fitNote(note, chord, this.lattice);
  }
}
