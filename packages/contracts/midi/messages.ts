/**
 * MIDI Message Types
 *
 * Channel-voice messages as a tagged union. Messages are plain readonly
 * objects; fanning a message out to several consumers copies it.
 *
 * `time` is absent until the message is timestamped (by the hub on arrival,
 * or by a player when it is scheduled).
 */

import type { Seconds } from "../core/time";

/** 0-indexed channel reserved for drum content. */
export const DRUM_CHANNEL = 9;

export interface NoteOnMessage {
  readonly type: "note_on";
  readonly channel: number;  // 0-15
  readonly note: number;     // 0-127
  readonly velocity: number; // 0-127, 0 releases the note
  readonly time?: Seconds;
}

export interface NoteOffMessage {
  readonly type: "note_off";
  readonly channel: number;
  readonly note: number;
  readonly velocity: number;
  readonly time?: Seconds;
}

export interface ControlChangeMessage {
  readonly type: "control_change";
  readonly channel: number;
  readonly control: number;
  readonly value: number;
  readonly time?: Seconds;
}

export interface ProgramChangeMessage {
  readonly type: "program_change";
  readonly channel: number;
  readonly program: number;
  readonly time?: Seconds;
}

export type MidiMessage =
  | NoteOnMessage
  | NoteOffMessage
  | ControlChangeMessage
  | ProgramChangeMessage;

export type MidiMessageType = MidiMessage["type"];

/** A message that carries a timestamp. */
export type TimedMidiMessage = MidiMessage & { readonly time: Seconds };

export function noteOn(note: number, velocity: number, channel = 0, time?: Seconds): NoteOnMessage {
  return time === undefined
    ? { type: "note_on", channel, note, velocity }
    : { type: "note_on", channel, note, velocity, time };
}

export function noteOff(note: number, channel = 0, time?: Seconds, velocity = 0): NoteOffMessage {
  return time === undefined
    ? { type: "note_off", channel, note, velocity }
    : { type: "note_off", channel, note, velocity, time };
}

export function controlChange(control: number, value: number, channel = 0, time?: Seconds): ControlChangeMessage {
  return time === undefined
    ? { type: "control_change", channel, control, value }
    : { type: "control_change", channel, control, value, time };
}

export function programChange(program: number, channel = 0, time?: Seconds): ProgramChangeMessage {
  return time === undefined
    ? { type: "program_change", channel, program }
    : { type: "program_change", channel, program, time };
}

/** True for a note_on that opens a note (velocity > 0). */
export function isNoteStart(msg: MidiMessage): msg is NoteOnMessage {
  return msg.type === "note_on" && msg.velocity > 0;
}

/** True for a note_off, or a note_on with velocity 0. */
export function isNoteEnd(msg: MidiMessage): msg is NoteOnMessage | NoteOffMessage {
  return msg.type === "note_off" || (msg.type === "note_on" && msg.velocity === 0);
}

export function hasTime(msg: MidiMessage): msg is TimedMidiMessage {
  return msg.time !== undefined;
}

/** Copy of `msg` with the given timestamp. */
export function withTime<M extends MidiMessage>(msg: M, time: Seconds): M & { readonly time: Seconds } {
  return { ...msg, time };
}

/** Copy of `msg` moved to another channel. */
export function withChannel<M extends MidiMessage>(msg: M, channel: number): M {
  return { ...msg, channel };
}

/**
 * Canonical textual rendering, e.g. `note_on channel=0 note=60 velocity=64 time=12.500000`.
 * Field order follows the wire order of each message type.
 */
export function formatMessage(msg: MidiMessage): string {
  const time = msg.time === undefined ? "" : ` time=${msg.time.toFixed(6)}`;
  switch (msg.type) {
    case "note_on":
    case "note_off":
      return `${msg.type} channel=${msg.channel} note=${msg.note} velocity=${msg.velocity}${time}`;
    case "control_change":
      return `${msg.type} channel=${msg.channel} control=${msg.control} value=${msg.value}${time}`;
    case "program_change":
      return `${msg.type} channel=${msg.channel} program=${msg.program}${time}`;
  }
}
