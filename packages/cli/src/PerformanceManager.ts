/**
 * Performance Manager
 *
 * Wires up the signal chain of a performance:
 *
 *   inputs → hub → interaction players → harmonizer → recorder → output
 *
 * and tears it down in order: interaction, harmonizer, recorder, hub.
 */

import type { MidiBackend, SequenceGenerator, Song } from "@antiphon/contracts";
import { MidiRecorder, virtualMidi } from "@antiphon/adapters";
import {
  BASS_PITCHES,
  DRUM_KIT,
  MELODY_PITCHES,
  MidiHarmonizer,
  MidiHub,
  ProtocolStateError,
  RandomWalkGenerator,
  SongStructureInteraction,
} from "@antiphon/engine";

import type { PerformanceConfig } from "./config";

export interface PerformanceManagerOptions {
  /** @default virtualMidi */
  backend?: MidiBackend;

  /** Generators for the melody, bass and drum slots, in that order. */
  generators?: readonly SequenceGenerator[];
}

/** Random-walk generators for the three roles. */
export function defaultGenerators(seed: number): SequenceGenerator[] {
  return [
    new RandomWalkGenerator({ id: "random_walk_melody", seed, pitches: MELODY_PITCHES }),
    new RandomWalkGenerator({ id: "random_walk_bass", seed: seed + 1, pitches: BASS_PITCHES }),
    new RandomWalkGenerator({ id: "random_walk_drums", seed: seed + 2, pitches: DRUM_KIT, isDrum: true }),
  ];
}

interface Chain {
  hub: MidiHub;
  harmonizer: MidiHarmonizer;
  recorder: MidiRecorder;
  interaction: SongStructureInteraction;
}

export class PerformanceManager {
  private config: PerformanceConfig;
  private song: Song;
  private backend: MidiBackend;
  private generators: readonly SequenceGenerator[];
  private chain: Chain | null = null;

  constructor(config: PerformanceConfig, song: Song, options: PerformanceManagerOptions = {}) {
    this.config = config;
    this.song = song;
    this.backend = options.backend ?? virtualMidi;
    this.generators = options.generators ?? defaultGenerators(config.seed);
  }

  get isRunning(): boolean {
    return this.chain !== null;
  }

  /** Seconds per tick: the configured value, else one bar at the tempo. */
  get tickDuration(): number {
    return this.config.tickDuration ?? (this.config.beatsPerBar * 60) / this.config.qpm;
  }

  start(): void {
    if (this.chain) {
      throw new ProtocolStateError("The performance is already running.");
    }
    const { config, backend } = this;
    const { ports } = config;

    const harmonizer = new MidiHarmonizer(ports.harmonizerInput, ports.harmonizerOutput, {
      melodyChannel: config.channels.melody,
      bassChannel: config.channels.bass,
      chordChannel: config.channels.chords,
      backend,
    });
    harmonizer.start();

    const recorder = new MidiRecorder(ports.harmonizerOutput, ports.output, {
      path: config.recording.path,
      bpm: config.recording.bpm,
      backend,
    });
    recorder.start();

    const hub = new MidiHub(ports.inputs, [ports.harmonizerInput], config.texture, { backend });

    const clock = config.signals.clock !== undefined
      ? { clockSignal: config.signals.clock }
      : { tickDuration: this.tickDuration };
    const interaction = new SongStructureInteraction(hub, this.generators, {
      qpm: config.qpm,
      structure: this.song,
      ...clock,
      chordPassthrough: config.chordPassthrough,
      partLength: config.partLength,
      beatsPerBar: config.beatsPerBar,
      endCallSignal: config.signals.endCall,
      panicSignal: config.signals.panic,
      metronomeChannel: config.metronomeChannel,
      channels: config.channels,
      controls: config.controls,
    });
    interaction.start();
    console.log("[Antiphon] Performance started.");

    this.chain = { hub, harmonizer, recorder, interaction };
  }

  /**
   * Resolves when the interaction ends by itself (end of song); rejects if
   * it failed.
   */
  async finished(): Promise<void> {
    if (!this.chain) {
      throw new ProtocolStateError("The performance has not been started.");
    }
    await this.chain.interaction.join();
  }

  /**
   * Tear the chain down. Returns the path of the written recording.
   */
  async stop(): Promise<string> {
    const chain = this.chain;
    if (!chain) {
      throw new ProtocolStateError("The performance has not been started.");
    }
    this.chain = null;

    try {
      await chain.interaction.stop();
    } finally {
      chain.harmonizer.stop();
      await chain.hub.stop();
    }
    const path = await chain.recorder.stop();
    console.log(`[Antiphon] Performance stopped. Recording written to ${path}`);
    return path;
  }
}
