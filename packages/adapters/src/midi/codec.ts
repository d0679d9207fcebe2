/**
 * Raw MIDI byte codec for channel-voice messages.
 */

import type { MidiMessage } from "@antiphon/contracts";

const NOTE_OFF = 0x8;
const NOTE_ON = 0x9;
const CONTROL_CHANGE = 0xb;
const PROGRAM_CHANGE = 0xc;

/**
 * Decode a raw packet. Returns null for status bytes this engine does not
 * handle (aftertouch, pitch bend, system messages).
 */
export function decodeMidi(data: Uint8Array, time?: number): MidiMessage | null {
  if (data.length < 2) return null;

  const status = data[0];
  const data1 = data[1] & 0x7f;
  const data2 = data.length > 2 ? data[2] & 0x7f : 0;
  const command = status >> 4;
  const channel = status & 0x0f;
  const stamp = time === undefined ? {} : { time };

  switch (command) {
    case NOTE_ON:
      return { type: "note_on", channel, note: data1, velocity: data2, ...stamp };
    case NOTE_OFF:
      return { type: "note_off", channel, note: data1, velocity: data2, ...stamp };
    case CONTROL_CHANGE:
      return { type: "control_change", channel, control: data1, value: data2, ...stamp };
    case PROGRAM_CHANGE:
      return { type: "program_change", channel, program: data1, ...stamp };
    default:
      return null;
  }
}

export function encodeMidi(msg: MidiMessage): Uint8Array {
  const channel = msg.channel & 0x0f;
  switch (msg.type) {
    case "note_on":
      return Uint8Array.of((NOTE_ON << 4) | channel, msg.note & 0x7f, msg.velocity & 0x7f);
    case "note_off":
      return Uint8Array.of((NOTE_OFF << 4) | channel, msg.note & 0x7f, msg.velocity & 0x7f);
    case "control_change":
      return Uint8Array.of((CONTROL_CHANGE << 4) | channel, msg.control & 0x7f, msg.value & 0x7f);
    case "program_change":
      return Uint8Array.of((PROGRAM_CHANGE << 4) | channel, msg.program & 0x7f);
  }
}
