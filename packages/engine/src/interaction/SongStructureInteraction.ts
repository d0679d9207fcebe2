/**
 * Song Structure Interaction
 *
 * Plays along with a song, one tick (bar) at a time. Every `partLength`
 * ticks a new part begins: melody, bass and drum responses are generated
 * from what was captured (or reused if the part has been heard before),
 * block chords are built from the part's progression, and all four are
 * scheduled on their players.
 *
 * Generation may overrun the tick budget. A response that is ready too
 * late is pushed back by whole ticks, and the cache remembers the later
 * start.
 *
 * Per tick:
 *   panic → refresh tempo → silence check → part lookup → respond
 *   (on part start) → report state → next bar
 */

import type {
  InstrumentRole,
  InteractionState,
  NoteSequence,
  Seconds,
  SequenceGenerator,
  Song,
  SongPart,
} from "@antiphon/contracts";
import { INSTRUMENT_ROLES, INTERACTION_STATE_VALUES, emptySequence } from "@antiphon/contracts";

import { now } from "../concurrency/clock";
import { requireExactlyOne } from "../errors";
import type { IterateOptions, MidiCaptor } from "../capture/MidiCaptor";
import type { MidiHub } from "../hub/MidiHub";
import type { SignalLike } from "../hub/MidiSignal";
import type { MidiPlayer } from "../playback/MidiPlayer";
import { adjustSequenceTimes, lastNoteEnd, trimNoteSequence } from "../sequences/sequenceUtils";
import { buildChordSequence } from "./chordAccompaniment";
import { computePushBackTicks } from "./latency";
import { MidiInteraction, type InteractionControls, type MidiInteractionConfig } from "./MidiInteraction";
import { ResponseCache } from "./ResponseCache";

export interface SongStructureControls extends InteractionControls {
  /** Listen ticks required before the end-call signal is honoured */
  minListenTicks?: number;
  /** Listen ticks after which listening is no longer reported */
  maxListenTicks?: number;
  /** Response length in ticks, overriding the part length */
  responseTicks?: number;
  /** Value 127 restarts the song when it ends */
  loop?: number;
  /** Receives the interaction state as a control change */
  state?: number;
}

export interface PlayerChannels {
  melody: number;
  bass: number;
  chords: number;
  drums: number;
}

export interface SongStructureInteractionConfig extends MidiInteractionConfig {
  structure: Song;

  /** Tick on every message matching this signal. Exclusive with `tickDuration`. */
  clockSignal?: SignalLike;

  /** Tick every `tickDuration` seconds. Exclusive with `clockSignal`. */
  tickDuration?: Seconds;

  /**
   * Play the chord accompaniment.
   * @default false
   */
  chordPassthrough?: boolean;

  /**
   * Ticks per song part.
   * @default 8
   */
  partLength?: number;

  /**
   * Beats per tick when sizing chords.
   * @default 4
   */
  beatsPerBar?: number;

  endCallSignal?: SignalLike;
  panicSignal?: SignalLike;

  /** Start a metronome on this channel when self-clocked. */
  metronomeChannel?: number;

  /** @default { melody: 1, bass: 2, chords: 3, drums: 9 } */
  channels?: Partial<PlayerChannels>;

  controls?: SongStructureControls;
}

const DEFAULT_CHANNELS: PlayerChannels = { melody: 1, bass: 2, chords: 3, drums: 9 };
const DEFAULT_PART_LENGTH = 8;

/** Generator slot of each role before the selection offset */
const ROLE_SLOTS: Record<InstrumentRole, number> = { melody: 0, bass: 1, drums: 2 };

type Players = Record<keyof PlayerChannels, MidiPlayer>;
type Responses = Record<InstrumentRole, NoteSequence>;

export class SongStructureInteraction extends MidiInteraction {
  private structure: Song;
  private tickOptions: IterateOptions;
  private chordPassthrough: boolean;
  private partLength: number;
  private beatsPerBar: number;
  private endCallSignal: SignalLike | undefined;
  private panicSignal: SignalLike | undefined;
  private metronomeChannel: number | undefined;
  private channels: PlayerChannels;
  private controls: SongStructureControls;

  /** One cache per role, owned by this run */
  private caches: Record<InstrumentRole, ResponseCache> = {
    melody: new ResponseCache(),
    bass: new ResponseCache(),
    drums: new ResponseCache(),
  };

  private captor: MidiCaptor | null = null;
  private endCall = false;
  private panic = false;
  private _interactionState: InteractionState = "idle";
  private _barsPlayed = 0;

  constructor(hub: MidiHub, generators: readonly SequenceGenerator[], config: SongStructureInteractionConfig) {
    super(hub, generators, config);
    requireExactlyOne(
      { clockSignal: config.clockSignal, tickDuration: config.tickDuration },
      "SongStructureInteraction"
    );
    this.tickOptions = config.clockSignal !== undefined
      ? { signal: config.clockSignal }
      : { period: config.tickDuration ?? 0 };

    this.structure = config.structure;
    this.chordPassthrough = config.chordPassthrough ?? false;
    this.partLength = config.partLength ?? DEFAULT_PART_LENGTH;
    this.beatsPerBar = config.beatsPerBar ?? 4;
    this.endCallSignal = config.endCallSignal;
    this.panicSignal = config.panicSignal;
    this.metronomeChannel = config.metronomeChannel;
    this.channels = { ...DEFAULT_CHANNELS, ...config.channels };
    this.controls = config.controls ?? {};
  }

  get interactionState(): InteractionState {
    return this._interactionState;
  }

  get barsPlayed(): number {
    return this._barsPlayed;
  }

  cache(role: InstrumentRole): ResponseCache {
    return this.caches[role];
  }

  /**
   * Stop capturing, stop the metronome, then let the loop stop the players.
   */
  async stop(): Promise<void> {
    this.requestStop();
    if (this.captor) {
      await this.captor.stop({ block: false });
    }
    await this.hub.stopMetronome();
    await this.join();
  }

  private get selfClocked(): boolean {
    return this.tickOptions.period !== undefined;
  }

  private get minListenTicks(): number {
    return this.hub.controlValue(this.controls.minListenTicks) ?? 0;
  }

  private get maxListenTicks(): number {
    return this.hub.controlValue(this.controls.maxListenTicks) || Infinity;
  }

  private get responseTicks(): number {
    return this.hub.controlValue(this.controls.responseTicks) || this.partLength;
  }

  private get shouldLoop(): boolean {
    return this.controls.loop !== undefined && this.hub.controlValue(this.controls.loop) === 127;
  }

  protected async run(): Promise<void> {
    const startTime = now();
    const captor = this.hub.startCapture(this.qpm, startTime);
    this.captor = captor;

    if (this.selfClocked && this.metronomeChannel !== undefined) {
      this.hub.startMetronome(this.qpm, startTime, { channel: this.metronomeChannel });
    }

    if (this.endCallSignal !== undefined) {
      captor.registerCallback(() => {
        this.endCall = true;
        console.log("[Interaction] End call signal received.");
      }, { signal: this.endCallSignal });
    }
    if (this.panicSignal !== undefined) {
      captor.registerCallback(() => {
        this.panic = true;
        console.log("[Interaction] Panic signal received.");
      }, { signal: this.panicSignal });
    }

    const players: Players = {
      melody: this.startPlayer(this.channels.melody),
      bass: this.startPlayer(this.channels.bass),
      chords: this.startPlayer(this.channels.chords),
      drums: this.startPlayer(this.channels.drums),
    };

    let lastTickTime = now();
    let listenTicks = 0;
    let melodySequence = emptySequence(this.qpm);

    try {
      for await (const snapshot of captor.iterate(this.tickOptions)) {
        if (this.stopped) break;

        if (this.panic) {
          for (const player of Object.values(players)) {
            player.updateSequence(emptySequence(this.qpm));
          }
          this.panic = false;
        }

        const tickTime = snapshot.totalTime;
        const qpm = this.qpm;
        if (this.selfClocked && this.metronomeChannel !== undefined) {
          this.hub.startMetronome(qpm, tickTime, { channel: this.metronomeChannel });
        }

        let captured: NoteSequence = { ...snapshot, qpm };
        const tickDuration = tickTime - lastTickTime;
        const silentTick = lastNoteEnd(captured) <= lastTickTime;
        if (!silentTick) listenTicks++;

        let partIndex = Math.floor(this._barsPlayed / this.partLength);
        if (partIndex >= this.structure.length) {
          if (!this.shouldLoop || this.structure.length === 0) {
            console.log("[Interaction] End of song.");
            break;
          }
          this._barsPlayed = 0;
          partIndex = 0;
        }
        const barInPart = this._barsPlayed % this.partLength;

        let captureStartTime = captor.startTime;
        if (silentTick) {
          // Move the input forward one tick.
          captured = adjustSequenceTimes(captured, tickDuration);
          captured.totalTime = tickTime;
          captureStartTime += tickDuration;
        }

        if (barInPart === 0) {
          melodySequence = await this.respond(
            this.structure[partIndex],
            captured,
            captureStartTime,
            tickTime,
            tickDuration,
            players
          );
        }

        // The performer's call is over; stop reporting that we listen.
        const callEnded =
          (this.endCall && listenTicks >= this.minListenTicks) ||
          silentTick ||
          listenTicks >= this.maxListenTicks;

        if (captured.notes.length === 0) {
          // Still idling: restart capture at this tick.
          if (melodySequence.totalTime <= tickTime) {
            this.updateState("idle");
          }
          if (captor.startTime < tickTime) {
            captor.startTime = tickTime;
          }
          this.endCall = false;
          listenTicks = 0;
        } else if (!callEnded) {
          this.updateState("listening");
        }

        lastTickTime = tickTime;
        this._barsPlayed++;
      }
    } finally {
      await captor.stop({ block: false });
      await this.hub.stopMetronome();
      await Promise.all(Object.values(players).map((player) => player.stop()));
    }
  }

  /**
   * Resolve and schedule the responses for a part. Returns the melody.
   */
  private async respond(
    part: SongPart,
    captured: NoteSequence,
    captureStartTime: Seconds,
    tickTime: Seconds,
    tickDuration: Seconds,
    players: Players
  ): Promise<NoteSequence> {
    const responseDuration = this.responseTicks * tickDuration;
    let responseStartTime = tickTime;

    const resolve = async (role: InstrumentRole): Promise<NoteSequence> => {
      const cached = this.caches[role].get(part.name);
      if (cached) {
        responseStartTime = cached.responseStartTime;
        return cached.sequence;
      }
      console.log(`[Interaction] New ${role} sequence for part '${part.name}'.`);
      const sequence = await this.generate(
        role,
        captured,
        captureStartTime,
        responseStartTime,
        responseStartTime + responseDuration
      );
      // Response start, not capture start: a replay begins where this response began.
      this.caches[role].set(part.name, sequence, responseStartTime);
      return sequence;
    };

    const responses: Responses = {
      melody: await resolve("melody"),
      bass: await resolve("bass"),
      drums: await resolve("drums"),
    };
    let chords = buildChordSequence(part, responseStartTime, tickDuration, this.partLength, {
      beatsPerBar: this.beatsPerBar,
      qpm: captured.qpm,
    });

    const pushTicks = computePushBackTicks(now(), responseStartTime, tickDuration);
    if (pushTicks > 0) {
      const delta = pushTicks * tickDuration;
      responseStartTime += delta;
      for (const role of INSTRUMENT_ROLES) {
        responses[role] = adjustSequenceTimes(responses[role], delta);
        this.caches[role].pushBack(part.name, responseStartTime);
      }
      chords = adjustSequenceTimes(chords, delta);
      console.warn(`[Interaction] Response too late. Pushing back ${pushTicks} ticks.`);
    }

    players.melody.updateSequence(responses.melody, responseStartTime);
    players.bass.updateSequence(responses.bass, responseStartTime);
    if (this.chordPassthrough) {
      players.chords.updateSequence(chords, responseStartTime);
    }
    players.drums.updateSequence(responses.drums, responseStartTime);
    this.updateState("responding");

    return responses.melody;
  }

  /**
   * Run the role's generator over [zeroTime, responseEndTime), rebased so
   * the capture starts at zero, and keep only the response window.
   */
  private async generate(
    role: InstrumentRole,
    input: NoteSequence,
    zeroTime: Seconds,
    responseStartTime: Seconds,
    responseEndTime: Seconds
  ): Promise<NoteSequence> {
    const start = responseStartTime - zeroTime;
    const end = responseEndTime - zeroTime;
    const generator = this.generatorFor(ROLE_SLOTS[role]);
    console.log(`[Interaction] Generating ${role} sequence using '${generator.id}' generator.`);

    const response = await generator.generate(adjustSequenceTimes(input, -zeroTime), {
      inputSection: { start: 0, end: start },
      generateSection: { start, end },
      temperature: this.temperature,
    });
    return adjustSequenceTimes(trimNoteSequence(response, start, end), zeroTime);
  }

  private startPlayer(channel: number): MidiPlayer {
    return this.hub.startPlayback(emptySequence(this.qpm), { channel, allowUpdates: true });
  }

  private updateState(state: InteractionState): void {
    if (this.controls.state !== undefined) {
      this.hub.sendControlChange(this.controls.state, INTERACTION_STATE_VALUES[state]);
    }
    if (state !== this._interactionState) {
      console.log(`[Interaction] State: ${state}`);
    }
    this._interactionState = state;
  }
}
