/**
 * MIDI Recorder
 *
 * Relays every message from an input port to an output port and records it
 * into a Standard MIDI File written on stop.
 *
 * Wall-clock arrival times are truncated to millisecond precision, made
 * relative to the first recorded message and converted to ticks at a fixed
 * tempo. Channels 0-3 and 9 (drums) each get a track of their own, in that
 * order; other channels are relayed but not recorded.
 */

import { writeFile } from "node:fs/promises";
import { Midi } from "@tonejs/midi";
import type {
  MidiBackend,
  MidiInputPort,
  MidiMessage,
  MidiOutputPort,
} from "@antiphon/contracts";
import { DRUM_CHANNEL, programChange } from "@antiphon/contracts";

import { openInputPort, openOutputPort, type PortRef } from "../midi/openPorts";
import { virtualMidi } from "../midi/VirtualMidiBackend";

/** Ticks per quarter note of the written file. */
export const RECORDER_PPQ = 480;

/** Channels written to the file, one track each, in track order. */
export const RECORDED_CHANNELS: readonly number[] = [0, 1, 2, 3, DRUM_CHANNEL];

export interface MidiRecorderConfig {
  /**
   * File the recording is written to on stop.
   * @default "recording.mid"
   */
  path?: string;

  /**
   * Tempo used to convert seconds to ticks.
   * @default 120
   */
  bpm?: number;

  /**
   * Program changes sent on start, keyed by channel.
   * @default { 1: 57, 2: 68, 3: 1 }
   */
  programs?: Record<number, number>;

  /** Called with every relayed message. */
  callback?: (msg: MidiMessage) => void;

  /** @default virtualMidi */
  backend?: MidiBackend;
}

const DEFAULT_CONFIG: Required<Omit<MidiRecorderConfig, "callback">> = {
  path: "recording.mid",
  bpm: 120,
  programs: { 1: 57, 2: 68, 3: 1 },
  backend: virtualMidi,
};

interface RecordedEvent {
  tick: number;
  msg: MidiMessage;
}

export class MidiRecorder {
  private config: Required<Omit<MidiRecorderConfig, "callback">> & Pick<MidiRecorderConfig, "callback">;
  private inPortRef: PortRef<MidiInputPort>;
  private outPortRef: PortRef<MidiOutputPort>;
  private portIn: MidiInputPort | null = null;
  private portOut: MidiOutputPort | null = null;
  private unsubscribe: (() => void) | null = null;

  /** Truncated arrival time (ms) of the first recorded message */
  private firstTimeMs: number | null = null;
  private tracks: Map<number, RecordedEvent[]> = new Map(
    RECORDED_CHANNELS.map((channel): [number, RecordedEvent[]] => [channel, []])
  );

  constructor(
    portIn: PortRef<MidiInputPort>,
    portOut: PortRef<MidiOutputPort>,
    config: MidiRecorderConfig = {}
  ) {
    this.inPortRef = portIn;
    this.outPortRef = portOut;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get isRecording(): boolean {
    return this.unsubscribe !== null;
  }

  start(): void {
    if (this.portIn) {
      throw new Error("MidiRecorder cannot be restarted; create a new instance.");
    }
    this.portIn = openInputPort(this.inPortRef, this.config.backend);
    this.portOut = openOutputPort(this.outPortRef, this.config.backend);

    for (const [channel, program] of Object.entries(this.config.programs)) {
      this.portOut.send(programChange(program, Number(channel)));
    }

    this.unsubscribe = this.portIn.onMessage((msg) => this.handleMessage(msg));
    console.log(`[MidiRecorder] Recording '${this.portIn.name}' to ${this.config.path}`);
  }

  /**
   * Stop relaying, close both ports and write the recording.
   * Returns the path written.
   */
  async stop(): Promise<string> {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
    this.portIn?.close();
    this.portOut?.close();

    await writeFile(this.config.path, this.toMidi().toArray());
    console.log(`[MidiRecorder] Wrote ${this.config.path}`);
    return this.config.path;
  }

  handleMessage(msg: MidiMessage): void {
    const tick = this.toTick(Date.now());

    this.tracks.get(msg.channel)?.push({ tick, msg });

    this.config.callback?.(msg);
    this.portOut?.send(msg);
  }

  /**
   * Build the MIDI file from everything recorded so far. Notes still open
   * are closed at the last recorded tick of their track.
   */
  toMidi(): Midi {
    const midi = new Midi();
    midi.header.setTempo(this.config.bpm);

    for (const [channel, events] of this.tracks) {
      const track = midi.addTrack();
      track.channel = channel;
      const lastTick = events.length > 0 ? events[events.length - 1].tick : 0;
      const open: Map<number, { tick: number; velocity: number }> = new Map();

      for (const { tick, msg } of events) {
        switch (msg.type) {
          case "note_on":
            if (msg.velocity > 0) {
              if (!open.has(msg.note)) open.set(msg.note, { tick, velocity: msg.velocity });
              break;
            }
          // fall through: velocity 0 releases
          case "note_off": {
            const started = open.get(msg.note);
            if (!started) break;
            open.delete(msg.note);
            track.addNote({
              midi: msg.note,
              ticks: started.tick,
              durationTicks: tick - started.tick,
              velocity: started.velocity / 127,
            });
            break;
          }
          case "control_change":
            track.addCC({ number: msg.control, value: msg.value / 127, ticks: tick });
            break;
          case "program_change":
            track.instrument.number = msg.program;
            break;
        }
      }

      for (const [note, started] of open) {
        track.addNote({
          midi: note,
          ticks: started.tick,
          durationTicks: lastTick - started.tick,
          velocity: started.velocity / 127,
        });
      }
    }

    return midi;
  }

  private toTick(nowMs: number): number {
    const truncated = Math.floor(nowMs);
    if (this.firstTimeMs === null) {
      this.firstTimeMs = truncated;
    }
    const seconds = (truncated - this.firstTimeMs) / 1000;
    // seconds per tick = (60 / bpm) / ppq
    return Math.round((seconds * RECORDER_PPQ * this.config.bpm) / 60);
  }
}
