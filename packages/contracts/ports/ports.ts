/**
 * MIDI Port Interfaces
 *
 * Abstraction over port drivers so the hub, harmonizer and recorder can be
 * exercised without hardware.
 */

import type { MidiMessage } from "../midi/messages";

export interface MidiInputPort {
  readonly name: string;
  /**
   * Subscribe to incoming messages. Returns an unsubscribe function.
   * Listeners are invoked synchronously on arrival.
   */
  onMessage(callback: (msg: MidiMessage) => void): () => void;
  close(): void;
}

export interface MidiOutputPort {
  readonly name: string;
  send(msg: MidiMessage): void;
  close(): void;
}

export interface OpenPortOptions {
  /** Create the port instead of connecting to an existing one. */
  virtual: boolean;
}

/**
 * A driver that can list and open ports.
 */
export interface MidiBackend {
  getInputNames(): string[];
  getOutputNames(): string[];
  openInput(name: string, options: OpenPortOptions): MidiInputPort;
  openOutput(name: string, options: OpenPortOptions): MidiOutputPort;
}
