/**
 * MIDI Player
 *
 * Streams a NoteSequence to an output port as timed messages. With updates
 * allowed, the sequence can be replaced while playing; notes left hanging
 * by the replacement are closed at the new queue's first event.
 */

import type {
  MidiOutputPort,
  NoteSequence,
  Seconds,
  TimedMidiMessage,
} from "@antiphon/contracts";
import { noteOff, noteOn, withTime } from "@antiphon/contracts";

import { BackgroundTask } from "../concurrency/BackgroundTask";
import { Condition } from "../concurrency/Condition";
import { now } from "../concurrency/clock";
import { ProtocolStateError } from "../errors";

export interface MidiPlayerConfig {
  /**
   * Notes starting before this time are not played.
   * @default now
   */
  startTime?: Seconds;

  /**
   * Keep running after the queue drains, waiting for `updateSequence`.
   * @default false
   */
  allowUpdates?: boolean;

  /**
   * Channel every message is sent on.
   * @default 0
   */
  channel?: number;

  /**
   * Added to every message time.
   * @default 0
   */
  offset?: Seconds;
}

export interface PlayerStopOptions {
  /** @default true */
  block?: boolean;
}

export class MidiPlayer extends BackgroundTask {
  private outport: MidiOutputPort;
  private channel: number;
  private offset: Seconds;

  /** Pitches currently sounding */
  private openNotes: Set<number> = new Set();

  /** Pending messages, ascending by (time, note) */
  private messageQueue: TimedMidiMessage[] = [];

  private updated = new Condition();
  private allowUpdates = true;
  private stopRequested = false;

  constructor(outport: MidiOutputPort, sequence: NoteSequence, config: MidiPlayerConfig = {}) {
    super("player");
    this.outport = outport;
    this.channel = config.channel ?? 0;
    this.offset = config.offset ?? 0;

    // The initial sequence goes through the update path.
    this.updateSequence(sequence, config.startTime);
    this.allowUpdates = config.allowUpdates ?? false;
  }

  /**
   * Replace the pending queue with the notes of `sequence` that start at or
   * after `startTime`.
   *
   * @throws ProtocolStateError if updates are disabled
   */
  updateSequence(sequence: NoteSequence, startTime: Seconds = now()): void {
    if (!this.allowUpdates) {
      throw new ProtocolStateError(
        "Attempted to update a MidiPlayer sequence with updates disabled."
      );
    }

    const messages: TimedMidiMessage[] = [];
    // Open pitches the new sequence closes without reopening.
    const closedNotes: Set<number> = new Set();

    for (const note of sequence.notes) {
      const endTime = note.endTime ?? sequence.totalTime;
      if (note.startTime >= startTime) {
        messages.push(withTime(noteOn(note.pitch, note.velocity, this.channel), note.startTime));
        messages.push(withTime(noteOff(note.pitch, this.channel), endTime));
      } else if (endTime >= startTime && this.openNotes.has(note.pitch)) {
        messages.push(withTime(noteOff(note.pitch, this.channel), endTime));
        closedNotes.add(note.pitch);
      }
    }

    const notesToClose = [...this.openNotes].filter((pitch) => !closedNotes.has(pitch));
    if (notesToClose.length > 0) {
      const nextEventTime = messages.length > 0 ? Math.min(...messages.map((m) => m.time)) : 0;
      for (const pitch of notesToClose) {
        messages.push(withTime(noteOff(pitch, this.channel), nextEventTime));
      }
    }

    this.messageQueue = messages
      .map((msg) => ({ ...msg, time: msg.time + this.offset }))
      .sort((a, b) => a.time - b.time || noteNumber(a) - noteNumber(b));
    this.updated.notifyAll();
  }

  /**
   * Disable updates and replace the queue with an immediate note_off for
   * every sounding note. Idempotent.
   */
  stop(options: PlayerStopOptions = {}): Promise<void> {
    if (!this.stopRequested) {
      this.stopRequested = true;
      this.allowUpdates = false;
      const time = now();
      this.messageQueue = [...this.openNotes].map((pitch) =>
        withTime(noteOff(pitch, this.channel), time)
      );
      this.updated.notifyAll();
    }
    return options.block === false ? Promise.resolve() : this.join();
  }

  /** Number of messages still queued. */
  get pending(): number {
    return this.messageQueue.length;
  }

  protected async run(): Promise<void> {
    // Drop whatever is already in the past.
    while (this.messageQueue.length > 0 && this.messageQueue[0].time < now()) {
      this.messageQueue.shift();
    }

    for (;;) {
      for (let next = this.messageQueue[0]; next !== undefined; next = this.messageQueue[0]) {
        const delta = next.time - now();
        if (delta > 0) {
          await this.updated.wait(delta);
          continue;
        }
        this.messageQueue.shift();
        if (next.type === "note_on") {
          this.openNotes.add(next.note);
        } else if (next.type === "note_off") {
          this.openNotes.delete(next.note);
        }
        this.outport.send(next);
      }

      if (!this.allowUpdates) break;
      await this.updated.wait();
    }
  }
}

function noteNumber(msg: TimedMidiMessage): number {
  return msg.type === "note_on" || msg.type === "note_off" ? msg.note : 0;
}
