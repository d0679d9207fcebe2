/**
 * Metronome
 *
 * Sends a click on every beat boundary `startTime + n * period`, cycling
 * through a fixed pattern of messages. A `null` slot is a rest. Note-on
 * clicks are followed by their note-off after `duration` seconds.
 */

import type { MidiMessage, MidiOutputPort, Qpm, Seconds } from "@antiphon/contracts";
import { noteOff, noteOn, programChange, withChannel } from "@antiphon/contracts";

import { BackgroundTask } from "../concurrency/BackgroundTask";
import { Deferred } from "../concurrency/Deferred";
import { now, sleep, sleepUntil } from "../concurrency/clock";

export interface MetronomeConfig {
  qpm: Qpm;

  /** Time of beat zero */
  startTime: Seconds;

  /** No tick is sent after this time. */
  stopTime?: Seconds;

  /**
   * General MIDI program selected on the click channel.
   * @default 117
   */
  program?: number;

  /**
   * One message per beat of the bar; `null` is a rest.
   * @default accent on beat 0, three plain clicks
   */
  pattern?: ReadonlyArray<MidiMessage | null>;

  /**
   * Seconds between a click's note_on and note_off.
   * @default 0.05
   */
  duration?: Seconds;

  /** @default 1 */
  channel?: number;
}

const DEFAULT_PROGRAM = 117;
const DEFAULT_CHANNEL = 1;
const DEFAULT_DURATION: Seconds = 0.05;
const DEFAULT_PATTERN: ReadonlyArray<MidiMessage | null> = [
  noteOn(44, 64),
  noteOn(35, 64),
  noteOn(35, 64),
  noteOn(35, 64),
];

export class Metronome extends BackgroundTask {
  private outport: MidiOutputPort;
  private period: Seconds = 0.5;
  private startTime: Seconds = 0;
  private stopTime: Seconds | undefined;
  private pattern: ReadonlyArray<MidiMessage | null> = DEFAULT_PATTERN;
  private duration: Seconds = DEFAULT_DURATION;
  private channel = DEFAULT_CHANNEL;

  /** Last tick sent, so a tick is never repeated */
  private lastTick = -1;

  /** Resolved to interrupt the current sleep */
  private wake = new Deferred();

  constructor(outport: MidiOutputPort, config: MetronomeConfig) {
    super("metronome");
    this.outport = outport;
    this.update(config);
  }

  /**
   * Replace tempo, timing and pattern without restarting. Re-sends the
   * program change on the (possibly new) channel.
   */
  update(config: MetronomeConfig): void {
    this.channel = config.channel ?? DEFAULT_CHANNEL;
    this.outport.send(programChange(config.program ?? DEFAULT_PROGRAM, this.channel));

    if (config.startTime !== this.startTime) {
      this.lastTick = -1;
    }
    this.period = 60 / config.qpm;
    this.startTime = config.startTime;
    this.stopTime = config.stopTime;
    this.pattern = config.pattern ?? DEFAULT_PATTERN;
    this.duration = config.duration ?? DEFAULT_DURATION;
    this.interrupt();
  }

  /**
   * No tick after `stopTime` (default: stop now).
   */
  stop(stopTime: Seconds = 0, block = true): Promise<void> {
    this.stopTime = stopTime;
    this.interrupt();
    return block ? this.join() : Promise.resolve();
  }

  protected async run(): Promise<void> {
    for (;;) {
      const elapsed = now() - this.startTime;
      const tickNumber = Math.max(0, Math.floor(elapsed / this.period) + 1, this.lastTick + 1);
      const tickTime = tickNumber * this.period + this.startTime;

      if (this.stopTime !== undefined && this.stopTime < tickTime) break;

      if (!(await sleepUntil(tickTime, this.wake.promise))) {
        // Settings changed while sleeping; recompute the tick.
        continue;
      }
      this.lastTick = tickNumber;

      const tickMessage = this.pattern[tickNumber % this.pattern.length];
      if (!tickMessage) continue;

      const click = withChannel(tickMessage, this.channel);
      this.outport.send(click);

      if (click.type === "note_on") {
        await sleep(this.duration);
        this.outport.send(noteOff(click.note, this.channel));
      }
    }
  }

  private interrupt(): void {
    this.wake.resolve();
    this.wake = new Deferred();
  }
}
