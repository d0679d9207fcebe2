/**
 * Signal Pattern Types
 *
 * A signal spec names a message type and/or field values to match.
 * Omitted fields are wildcards. See MidiSignal in the engine for the
 * construction rules.
 */

export type SignalMessageType = "note_on" | "note_off" | "control_change";

export interface MidiSignalSpec {
  type?: SignalMessageType;
  channel?: number;
  note?: number;
  velocity?: number;
  control?: number;
  value?: number;
}

export type MidiSignalField = Exclude<keyof MidiSignalSpec, "type">;
