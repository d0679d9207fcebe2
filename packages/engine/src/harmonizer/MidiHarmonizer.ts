/**
 * MIDI Harmonizer
 *
 * Relays messages between two ports, fitting note messages on the melody
 * and bass channels to whatever chord is sounding on the chord channel.
 * Bass notes are moved down an octave after fitting.
 *
 * A note_off is rewritten to the same pitch its note_on was, so a chord
 * change while a note is held cannot leave it hanging.
 */

import type {
  MidiBackend,
  MidiInputPort,
  MidiMessage,
  MidiOutputPort,
} from "@antiphon/contracts";
import { isNoteEnd, isNoteStart } from "@antiphon/contracts";
import { openInputPort, openOutputPort, virtualMidi, type PortRef } from "@antiphon/adapters";

import { ProtocolStateError } from "../errors";
import { MidiState } from "./MidiState";
import { NoteFitter } from "./fitNote";

export interface MidiHarmonizerConfig {
  /** @default 1 */
  melodyChannel?: number;

  /** @default 2 */
  bassChannel?: number;

  /** Channel whose sounding notes form the chord. @default 3 */
  chordChannel?: number;

  /** Called with each original message and its rewrite. */
  callback?: (original: MidiMessage, rewritten: MidiMessage) => void;

  /** @default virtualMidi */
  backend?: MidiBackend;
}

const BASS_SHIFT = -12;

export class MidiHarmonizer {
  private melodyChannel: number;
  private bassChannel: number;
  private chordChannel: number;
  private callback: MidiHarmonizerConfig["callback"];
  private backend: MidiBackend;

  private inPortRef: PortRef<MidiInputPort>;
  private outPortRef: PortRef<MidiOutputPort>;
  private portIn: MidiInputPort | null = null;
  private portOut: MidiOutputPort | null = null;
  private unsubscribe: (() => void) | null = null;

  private state = new MidiState();
  private fitter = new NoteFitter();

  /** Pitch each held input note was sent as, keyed by "channel:note" */
  private heldNotes: Map<string, number> = new Map();

  constructor(
    portIn: PortRef<MidiInputPort>,
    portOut: PortRef<MidiOutputPort>,
    config: MidiHarmonizerConfig = {}
  ) {
    this.inPortRef = portIn;
    this.outPortRef = portOut;
    this.melodyChannel = config.melodyChannel ?? 1;
    this.bassChannel = config.bassChannel ?? 2;
    this.chordChannel = config.chordChannel ?? 3;
    this.callback = config.callback;
    this.backend = config.backend ?? virtualMidi;
  }

  get isRunning(): boolean {
    return this.unsubscribe !== null;
  }

  start(): void {
    if (this.portIn) {
      throw new ProtocolStateError("MidiHarmonizer cannot be restarted; create a new instance.");
    }
    this.portIn = openInputPort(this.inPortRef, this.backend);
    this.portOut = openOutputPort(this.outPortRef, this.backend);
    this.unsubscribe = this.portIn.onMessage((msg) => this.handleMessage(msg));
    console.log(`[MidiHarmonizer] Relaying '${this.portIn.name}' to '${this.portOut.name}'`);
  }

  stop(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
    this.portIn?.close();
    this.portOut?.close();
    this.state.reset();
    this.heldNotes.clear();
  }

  /**
   * Rewrite one message and relay it. Returns the rewritten message.
   */
  handleMessage(msg: MidiMessage): MidiMessage {
    this.state.handleMessage(msg);
    const rewritten = this.rewrite(msg);

    if (this.callback) {
      try {
        this.callback(msg, rewritten);
      } catch (err) {
        console.error("[MidiHarmonizer] Callback failed:", err);
      }
    }

    this.portOut?.send(rewritten);
    return rewritten;
  }

  private rewrite(msg: MidiMessage): MidiMessage {
    if (msg.type !== "note_on" && msg.type !== "note_off") return msg;
    if (msg.channel !== this.melodyChannel && msg.channel !== this.bassChannel) return msg;

    const key = `${msg.channel}:${msg.note}`;
    if (isNoteEnd(msg)) {
      const held = this.heldNotes.get(key);
      this.heldNotes.delete(key);
      if (held !== undefined) {
        return { ...msg, note: held };
      }
    }

    let note = this.fitter.fit(msg.note, this.state.activeNotes(this.chordChannel));
    if (msg.channel === this.bassChannel) {
      note = Math.max(0, note + BASS_SHIFT);
    }

    if (isNoteStart(msg)) {
      this.heldNotes.set(key, note);
    }
    return { ...msg, note };
  }
}
