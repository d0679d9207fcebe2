/**
 * Sequence Utilities
 *
 * Pure helpers over NoteSequence. None of them mutate their input.
 */

import type { NoteSequence, Seconds } from "@antiphon/contracts";
import { cloneSequence } from "@antiphon/contracts";

/**
 * Copy of `sequence` with every note and the total time shifted by `delta`.
 */
export function adjustSequenceTimes(sequence: NoteSequence, delta: Seconds): NoteSequence {
  const retimed = cloneSequence(sequence);
  for (const note of retimed.notes) {
    note.startTime += delta;
    if (note.endTime !== undefined) {
      note.endTime += delta;
    }
  }
  retimed.totalTime += delta;
  return retimed;
}

/**
 * Keep the notes that start within [start, end), truncating any that run
 * past `end`. Times are not rebased.
 */
export function trimNoteSequence(sequence: NoteSequence, start: Seconds, end: Seconds): NoteSequence {
  const notes = sequence.notes
    .filter((note) => note.startTime >= start && note.startTime < end)
    .map((note) => ({
      ...note,
      endTime: note.endTime === undefined ? end : Math.min(note.endTime, end),
    }));
  return {
    notes,
    totalTime: Math.min(sequence.totalTime, end),
    qpm: sequence.qpm,
  };
}

/**
 * Copy of `sequence` as seen at `endTime`: notes starting at or after it
 * are dropped, open or longer notes are clipped to it.
 */
export function clipSequence(sequence: NoteSequence, endTime: Seconds): NoteSequence {
  const clipped = cloneSequence(sequence);
  const cut = clipped.notes.findIndex((note) => note.startTime >= endTime);
  if (cut >= 0) {
    clipped.notes.splice(cut);
  }
  for (const note of clipped.notes) {
    if (note.endTime === undefined || note.endTime > endTime) {
      note.endTime = endTime;
    }
  }
  clipped.totalTime = endTime;
  return clipped;
}

/** Latest note end in the sequence, or 0 if it has no notes. */
export function lastNoteEnd(sequence: NoteSequence): Seconds {
  let last = 0;
  for (const note of sequence.notes) {
    last = Math.max(last, note.endTime ?? note.startTime);
  }
  return sequence.notes.length > 0 ? last : 0;
}
