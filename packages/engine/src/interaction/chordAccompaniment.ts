import type { NoteEvent, NoteSequence, Qpm, Seconds, SongPart } from "@antiphon/contracts";
import { DEFAULT_QPM } from "@antiphon/contracts";

export interface ChordSequenceOptions {
  /** @default 4 */
  beatsPerBar?: number;
  /** @default 100 */
  velocity?: number;
  qpm?: Qpm;
}

/**
 * Block chords for a part, starting at `startTime`. A chord of `beats`
 * beats lasts `beats / beatsPerBar` ticks; the progression repeats until
 * `ticks` ticks are filled.
 */
export function buildChordSequence(
  part: SongPart,
  startTime: Seconds,
  tickDuration: Seconds,
  ticks: number,
  options: ChordSequenceOptions = {}
): NoteSequence {
  const beatsPerBar = options.beatsPerBar ?? 4;
  const velocity = options.velocity ?? 100;
  const total = ticks * tickDuration;
  const chords = part.getMidiChords();
  const durations = part.chords.map((chord) => (chord.beats / beatsPerBar) * tickDuration);

  const notes: NoteEvent[] = [];
  let offset = 0;
  for (let i = 0; chords.length > 0 && offset < total; i++) {
    const duration = durations[i % durations.length];
    if (!(duration > 0)) break;
    const end = Math.min(offset + duration, total);
    for (const pitch of chords[i % chords.length]) {
      notes.push({ pitch, velocity, startTime: startTime + offset, endTime: startTime + end });
    }
    offset += duration;
  }

  return { notes, totalTime: startTime + total, qpm: options.qpm ?? DEFAULT_QPM };
}
