/**
 * Random Walk Generator
 *
 * A model-free SequenceGenerator for running a performance without
 * trained generators. Walks a fixed pitch set one eighth note at a time,
 * starting near the last input note. Temperature widens the steps.
 *
 * Output depends only on the seed, the input's last pitch and tempo, and
 * the window, so repeated calls with the same arguments agree.
 */

import type {
  GeneratorOptions,
  NoteEvent,
  NoteSequence,
  SequenceGenerator,
} from "@antiphon/contracts";

/** C major, C4 to C5 */
export const MELODY_PITCHES: readonly number[] = [60, 62, 64, 65, 67, 69, 71, 72];

/** C major, C2 to C3 */
export const BASS_PITCHES: readonly number[] = [36, 38, 40, 41, 43, 45, 47, 48];

/** Kick, snare, closed and open hi-hat */
export const DRUM_KIT: readonly number[] = [36, 38, 42, 46];

export interface RandomWalkConfig {
  id?: string;

  /** @default 1 */
  seed?: number;

  /** @default MELODY_PITCHES */
  pitches?: readonly number[];

  /** @default 90 */
  velocity?: number;

  /** Flag generated notes as drums. @default false */
  isDrum?: boolean;
}

/** Linear congruential step, as unit interval. */
function nextUnit(state: { seed: number }): number {
  state.seed = (1664525 * (state.seed >>> 0) + 1013904223) >>> 0;
  return state.seed / 0x100000000;
}

export class RandomWalkGenerator implements SequenceGenerator {
  readonly id: string;
  private seed: number;
  private pitches: readonly number[];
  private velocity: number;
  private isDrum: boolean;

  constructor(config: RandomWalkConfig = {}) {
    this.id = config.id ?? "random_walk";
    this.seed = config.seed ?? 1;
    this.pitches = config.pitches ?? MELODY_PITCHES;
    this.velocity = config.velocity ?? 90;
    this.isDrum = config.isDrum ?? false;
    if (this.pitches.length === 0) {
      throw new Error("RandomWalkGenerator needs at least one pitch.");
    }
  }

  generate(input: NoteSequence, options: GeneratorOptions): NoteSequence {
    const { start, end } = options.generateSection;
    const step = 60 / input.qpm / 2;
    const spread = Math.max(1, Math.round(options.temperature * 2));
    const rng = { seed: this.seed };

    let index = this.startIndex(input);
    const notes: NoteEvent[] = [];
    for (let i = 0; start + (i + 1) * step <= end + 1e-9; i++) {
      const startTime = start + i * step;
      notes.push({
        pitch: this.pitches[index],
        velocity: this.velocity,
        startTime,
        endTime: startTime + step,
        isDrum: this.isDrum,
      });
      const move = Math.floor(nextUnit(rng) * (2 * spread + 1)) - spread;
      index = Math.max(0, Math.min(this.pitches.length - 1, index + move));
    }

    return { notes, totalTime: end, qpm: input.qpm };
  }

  /** Index of the pitch nearest the last input note, else the middle. */
  private startIndex(input: NoteSequence): number {
    const last = input.notes[input.notes.length - 1];
    if (!last) return Math.floor(this.pitches.length / 2);

    let best = 0;
    this.pitches.forEach((pitch, i) => {
      if (Math.abs(pitch - last.pitch) < Math.abs(this.pitches[best] - last.pitch)) {
        best = i;
      }
    });
    return best;
  }
}
