/**
 * Note Sequence Types
 *
 * Structured note data exchanged between captors, the generator and players.
 * Times are absolute seconds unless a sequence has been explicitly rebased.
 */

import type { Seconds, Qpm } from "../core/time";

export interface NoteEvent {
  pitch: number;    // 0-127
  velocity: number; // 1-127
  startTime: Seconds;
  /** Unset while the note is still open. */
  endTime?: Seconds;
  isDrum?: boolean;
}

export interface NoteSequence {
  /** Ordered by start time. */
  notes: NoteEvent[];
  totalTime: Seconds;
  qpm: Qpm;
}

/** Default tempo if none is given. */
export const DEFAULT_QPM: Qpm = 120;

export function emptySequence(qpm: Qpm = DEFAULT_QPM): NoteSequence {
  return { notes: [], totalTime: 0, qpm };
}

/** Deep copy: callers may mutate the result freely. */
export function cloneSequence(sequence: NoteSequence): NoteSequence {
  return {
    notes: sequence.notes.map((note) => ({ ...note })),
    totalTime: sequence.totalTime,
    qpm: sequence.qpm,
  };
}
