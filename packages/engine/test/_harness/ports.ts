/**
 * Port Doubles
 *
 * In-memory output port that keeps every message sent to it.
 */

import type { MidiMessage, MidiOutputPort } from "@antiphon/contracts";

export class RecordingOutputPort implements MidiOutputPort {
  readonly sent: MidiMessage[] = [];
  closed = false;

  constructor(readonly name = "recording") {}

  send(msg: MidiMessage): void {
    this.sent.push(msg);
  }

  close(): void {
    this.closed = true;
  }

  /** Compact `type:note` / `type:control=value` labels, in send order. */
  labels(): string[] {
    return this.sent.map(label);
  }
}

export function label(msg: MidiMessage): string {
  switch (msg.type) {
    case "note_on":
    case "note_off":
      return `${msg.type}:${msg.note}`;
    case "control_change":
      return `${msg.type}:${msg.control}=${msg.value}`;
    case "program_change":
      return `${msg.type}:${msg.program}`;
  }
}
