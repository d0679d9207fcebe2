/**
 * MIDI Interaction
 *
 * Base for a long-running performance loop over a hub and a set of
 * sequence generators. Tempo, temperature and generator selection follow
 * controller values when their control numbers are configured.
 */

import type { Qpm, SequenceGenerator } from "@antiphon/contracts";

import { BackgroundTask } from "../concurrency/BackgroundTask";
import { ConfigurationError } from "../errors";
import type { MidiHub } from "../hub/MidiHub";

export interface InteractionControls {
  /** Generator selection, taken modulo the generator count */
  generatorSelect?: number;
  /** Tempo as `value + 60` qpm */
  tempo?: number;
  /** Temperature mapped linearly onto [0.1, 2.0] */
  temperature?: number;
}

export interface MidiInteractionConfig {
  /** Tempo while no tempo control value has been received */
  qpm: Qpm;
  controls?: InteractionControls;
}

/** Base qpm when the tempo is set by a control change. */
const BASE_QPM = 60;

const MIN_TEMPERATURE = 0.1;
const MAX_TEMPERATURE = 2.0;
const DEFAULT_TEMPERATURE = 1.0;

export abstract class MidiInteraction extends BackgroundTask {
  protected readonly hub: MidiHub;
  protected readonly generators: readonly SequenceGenerator[];
  private defaultQpm: Qpm;
  private baseControls: InteractionControls;
  private stopRequested = false;

  constructor(hub: MidiHub, generators: readonly SequenceGenerator[], config: MidiInteractionConfig) {
    super("interaction");
    if (generators.length === 0) {
      throw new ConfigurationError("A MidiInteraction needs at least one sequence generator.");
    }
    this.hub = hub;
    this.generators = generators;
    this.defaultQpm = config.qpm;
    this.baseControls = config.controls ?? {};
  }

  /**
   * The generator for `slot`, shifted by the selection control value.
   */
  generatorFor(slot: number): SequenceGenerator {
    const count = this.generators.length;
    const selected = this.hub.controlValue(this.baseControls.generatorSelect) ?? 0;
    return this.generators[(slot + selected) % count];
  }

  get qpm(): Qpm {
    const value = this.hub.controlValue(this.baseControls.tempo);
    return value === undefined ? this.defaultQpm : value + BASE_QPM;
  }

  get temperature(): number {
    const value = this.hub.controlValue(this.baseControls.temperature);
    if (value === undefined) return DEFAULT_TEMPERATURE;
    return MIN_TEMPERATURE + (value / 127) * (MAX_TEMPERATURE - MIN_TEMPERATURE);
  }

  get stopped(): boolean {
    return this.stopRequested;
  }

  /**
   * Ask the loop to end and wait for it.
   */
  async stop(): Promise<void> {
    this.requestStop();
    await this.join();
  }

  /** Flag checked by the loop on every tick. */
  protected requestStop(): void {
    this.stopRequested = true;
  }
}
