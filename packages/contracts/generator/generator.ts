/**
 * Sequence Generator Contract
 *
 * The generator is an external collaborator: given an input sequence and
 * the input/generation windows, it returns a sequence covering the
 * generation window. Times passed in are relative to the capture start.
 */

import type { Seconds } from "../core/time";
import type { NoteSequence } from "../sequence/sequence";

export interface TimeSection {
  start: Seconds;
  end: Seconds;
}

export interface GeneratorOptions {
  inputSection: TimeSection;
  generateSection: TimeSection;
  /** 0.1 (conservative) .. 2.0 (adventurous) */
  temperature: number;
}

export interface SequenceGenerator {
  readonly id: string;
  generate(input: NoteSequence, options: GeneratorOptions): NoteSequence | Promise<NoteSequence>;
}
