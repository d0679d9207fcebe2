/**
 * MIDI Hub
 *
 * Owns the input and output ports and routes every incoming message:
 *
 *   1. wakes one-shot signal waiters (consumed on first match)
 *   2. fires persistent callbacks (fire-and-forget)
 *   3. hands a copy to every live captor
 *   4. records control values
 *   5. forwards to the outputs under the texture policy, if passthrough
 *
 * Also the factory for captors, players and the metronome, all of which it
 * stops on `stop()`.
 */

import type {
  MidiBackend,
  MidiInputPort,
  MidiMessage,
  MidiOutputPort,
  NoteSequence,
  Qpm,
  Seconds,
  Texture,
  TimedMidiMessage,
} from "@antiphon/contracts";
import { controlChange, isNoteEnd, isNoteStart, noteOff, withTime } from "@antiphon/contracts";
import {
  MultiOutputPort,
  openInputPort,
  openOutputPort,
  virtualMidi,
  type PortRef,
} from "@antiphon/adapters";

import { Condition } from "../concurrency/Condition";
import { now, sleep } from "../concurrency/clock";
import { ConfigurationError, requireExactlyOne } from "../errors";
import type { MidiCaptor } from "../capture/MidiCaptor";
import { MonophonicMidiCaptor } from "../capture/MonophonicMidiCaptor";
import { PolyphonicMidiCaptor } from "../capture/PolyphonicMidiCaptor";
import { Metronome } from "../metronome/Metronome";
import { MidiPlayer } from "../playback/MidiPlayer";
import { MidiSignal, toSignal, type SignalLike } from "./MidiSignal";

export interface MidiHubConfig {
  /**
   * Forward incoming messages to the outputs.
   * @default true
   */
  passthrough?: boolean;

  /**
   * Seconds added to every message time of players started by the hub.
   * @default 0
   */
  playbackOffset?: Seconds;

  /**
   * Driver used to open ports given by name.
   * @default the in-process virtual backend
   */
  backend?: MidiBackend;
}

export type HubCallback = (msg: TimedMidiMessage) => void | Promise<void>;

export interface CaptureOptions {
  stopTime?: Seconds;
  stopSignal?: SignalLike;
}

export interface PlaybackOptions {
  /** @default 0 */
  channel?: number;
  /** @default now */
  startTime?: Seconds;
  /** @default false */
  allowUpdates?: boolean;
}

export interface MetronomeOptions {
  pattern?: ReadonlyArray<MidiMessage | null>;
  channel?: number;
}

/** Exactly one of `signal` or `timeout`. */
export type WaitOptions =
  | { signal: SignalLike; timeout?: undefined }
  | { timeout: Seconds; signal?: undefined };

interface SignalWaiters {
  signal: MidiSignal;
  condition: Condition;
}

interface CallbackEntry {
  signal: MidiSignal;
  fns: Set<HubCallback>;
}

export class MidiHub {
  private texture: Texture;
  private _passthrough: boolean;
  private playbackOffset: Seconds;

  /** Pitches forwarded with a note_on and not yet closed */
  private openNotes: Set<number> = new Set();

  /** One-shot waiters keyed by signal text */
  private signals: Map<string, SignalWaiters> = new Map();

  /** Persistent callbacks keyed by signal text */
  private callbacks: Map<string, CallbackEntry> = new Map();

  /** Last value received per control number */
  private controlValues: Map<number, number> = new Map();

  private captors: MidiCaptor[] = [];
  private players: MidiPlayer[] = [];
  private metronome: Metronome | null = null;

  private inports: MidiInputPort[] = [];
  private unsubscribes: Array<() => void> = [];
  private outport: MultiOutputPort;

  constructor(
    inputPorts: ReadonlyArray<PortRef<MidiInputPort>>,
    outputPorts: ReadonlyArray<PortRef<MidiOutputPort>>,
    texture: Texture,
    config: MidiHubConfig = {}
  ) {
    const backend = config.backend ?? virtualMidi;
    this.texture = texture;
    this._passthrough = config.passthrough ?? true;
    this.playbackOffset = config.playbackOffset ?? 0;

    if (inputPorts.length === 0) {
      console.warn("[MidiHub] No input port specified. Capture disabled.");
    }
    for (const port of inputPorts) {
      const inport = openInputPort(port, backend);
      this.inports.push(inport);
      this.unsubscribes.push(inport.onMessage((msg) => this.handleMessage(msg)));
    }

    this.outport = new MultiOutputPort(outputPorts.map((port) => openOutputPort(port, backend)));
  }

  get passthrough(): boolean {
    return this._passthrough;
  }

  /** Changing passthrough closes every note it left open. */
  set passthrough(value: boolean) {
    if (this._passthrough === value) return;
    for (const pitch of this.openNotes) {
      this.outport.send(noteOff(pitch));
    }
    this.openNotes.clear();
    this._passthrough = value;
  }

  /** The fan-out of every output port. */
  get output(): MidiOutputPort {
    return this.outport;
  }

  /**
   * Route one incoming message. Untimed messages are stamped with the
   * current time; program changes are ignored.
   */
  handleMessage(incoming: MidiMessage): void {
    if (incoming.type === "program_change") return;
    const msg: TimedMidiMessage = withTime(incoming, incoming.time || now());

    for (const [key, waiters] of this.signals) {
      if (waiters.signal.matches(msg)) {
        waiters.condition.notifyAll();
        this.signals.delete(key);
      }
    }

    for (const entry of this.callbacks.values()) {
      if (!entry.signal.matches(msg)) continue;
      for (const fn of entry.fns) {
        Promise.resolve(msg)
          .then(fn)
          .catch((err: unknown) => {
            console.error(`[MidiHub] Callback for '${entry.signal.key}' failed:`, err);
          });
      }
    }

    this.captors = this.captors.filter((captor) => captor.isAlive());
    for (const captor of this.captors) {
      captor.receive({ ...msg });
    }

    if (msg.type === "control_change") {
      if (this.controlValues.get(msg.control) !== msg.value) {
        console.debug(`[MidiHub] Control change ${msg.control}: ${msg.value}`);
      }
      this.controlValues.set(msg.control, msg.value);
    }

    if (this._passthrough) {
      this.forward(msg);
    }
  }

  /**
   * Start a captor matching the hub's texture.
   */
  startCapture(qpm: Qpm, startTime: Seconds, options: CaptureOptions = {}): MidiCaptor {
    const config = { qpm, startTime, ...options };
    const captor = this.texture === "monophonic"
      ? new MonophonicMidiCaptor(config)
      : new PolyphonicMidiCaptor(config);
    this.captors.push(captor);
    captor.start();
    return captor;
  }

  /**
   * Capture until a stop condition is met and return the final sequence.
   */
  async captureSequence(qpm: Qpm, startTime: Seconds, options: CaptureOptions): Promise<NoteSequence> {
    if (options.stopTime === undefined && options.stopSignal === undefined) {
      throw new ConfigurationError(
        "At least one of `stopTime` and `stopSignal` must be provided to `captureSequence` call."
      );
    }
    const captor = this.startCapture(qpm, startTime, options);
    await captor.join();
    return captor.capturedSequence();
  }

  /**
   * Resolve on the next message matching `signal`, or after `timeout`
   * seconds.
   */
  async waitForEvent(options: WaitOptions): Promise<void> {
    requireExactlyOne({ signal: options.signal, timeout: options.timeout }, "waitForEvent");
    if (options.signal === undefined) {
      await sleep(options.timeout ?? 0);
      return;
    }

    const signal = toSignal(options.signal);
    let waiters = this.signals.get(signal.key);
    if (!waiters) {
      waiters = { signal, condition: new Condition() };
      this.signals.set(signal.key, waiters);
    }
    await waiters.condition.wait();
  }

  /**
   * Release pending `waitForEvent` calls: all of them, or only those
   * waiting on `signal`. Also wakes captor iterators on the same signal.
   */
  wakeSignalWaiters(signal?: SignalLike): void {
    const key = signal === undefined ? undefined : toSignal(signal).key;
    for (const [pattern, waiters] of this.signals) {
      if (key === undefined || pattern === key) {
        waiters.condition.notifyAll();
        this.signals.delete(pattern);
      }
    }
    for (const captor of this.captors) {
      captor.wakeSignalWaiters(signal);
    }
  }

  /**
   * Start the metronome, or retime the running one.
   */
  startMetronome(qpm: Qpm, startTime: Seconds, options: MetronomeOptions = {}): void {
    const config = { qpm, startTime, ...options };
    if (this.metronome?.isAlive()) {
      this.metronome.update(config);
      return;
    }
    this.metronome = new Metronome(this.outport, config);
    this.metronome.start();
  }

  async stopMetronome(stopTime: Seconds = 0, block = true): Promise<void> {
    const metronome = this.metronome;
    if (!metronome) return;
    this.metronome = null;
    await metronome.stop(stopTime, block);
  }

  startPlayback(sequence: NoteSequence, options: PlaybackOptions = {}): MidiPlayer {
    const player = new MidiPlayer(this.outport, sequence, {
      channel: options.channel ?? 0,
      startTime: options.startTime ?? now(),
      allowUpdates: options.allowUpdates ?? false,
      offset: this.playbackOffset,
    });
    this.players.push(player);
    player.start();
    return player;
  }

  controlValue(control: number | undefined): number | undefined {
    if (control === undefined) return undefined;
    return this.controlValues.get(control);
  }

  sendControlChange(control: number, value: number, channel = 0): void {
    this.outport.send(controlChange(control, value, channel));
  }

  /**
   * Call `fn` with every message matching `signal` until the returned
   * function is called.
   */
  registerCallback(fn: HubCallback, signal: SignalLike): () => void {
    const compiled = toSignal(signal);
    let entry = this.callbacks.get(compiled.key);
    if (!entry) {
      entry = { signal: compiled, fns: new Set() };
      this.callbacks.set(compiled.key, entry);
    }
    const registered = entry;
    registered.fns.add(fn);

    return () => {
      registered.fns.delete(fn);
      if (registered.fns.size === 0 && this.callbacks.get(compiled.key) === registered) {
        this.callbacks.delete(compiled.key);
      }
    };
  }

  /**
   * Stop every captor, player and the metronome (signal all, then wait),
   * then close the ports.
   */
  async stop(): Promise<void> {
    const captors = this.captors;
    const players = this.players;
    this.captors = [];
    this.players = [];

    const joins: Array<Promise<void>> = [];
    for (const captor of captors) {
      void captor.stop({ block: false });
      joins.push(captor.join());
    }
    for (const player of players) {
      void player.stop({ block: false });
      joins.push(player.join());
    }
    joins.push(this.stopMetronome(0, true));
    await Promise.all(joins);

    for (const unsubscribe of this.unsubscribes) unsubscribe();
    this.unsubscribes = [];
    for (const inport of this.inports) inport.close();
    this.inports = [];
    this.outport.close();
  }

  private forward(msg: TimedMidiMessage): void {
    if (this.texture === "polyphonic") {
      if (isNoteStart(msg)) {
        this.openNotes.add(msg.note);
      } else if (isNoteEnd(msg)) {
        this.openNotes.delete(msg.note);
      }
      this.outport.send(msg);
      return;
    }

    // Monophonic: at most one forwarded note is open.
    if (msg.type !== "note_on" && msg.type !== "note_off") {
      this.outport.send(msg);
    } else if (isNoteStart(msg)) {
      for (const pitch of this.openNotes) {
        this.outport.send(noteOff(pitch, msg.channel));
      }
      this.openNotes.clear();
      this.outport.send(msg);
      this.openNotes.add(msg.note);
    } else if (this.openNotes.has(msg.note)) {
      this.outport.send(msg);
      this.openNotes.delete(msg.note);
    }
  }
}
