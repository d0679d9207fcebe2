/**
 * Virtual MIDI Backend
 *
 * In-process named loopback buses. Every message sent to the output port
 * named "X" is delivered, synchronously and in send order, to every input
 * port opened on "X". Opening a port with `virtual: true` creates the bus
 * if needed; opening a non-virtual port requires the bus to exist already.
 */

import type {
  MidiBackend,
  MidiInputPort,
  MidiMessage,
  MidiOutputPort,
  OpenPortOptions,
} from "@antiphon/contracts";

interface Bus {
  listeners: Set<(msg: MidiMessage) => void>;
}

class VirtualInputPort implements MidiInputPort {
  private subscriptions: Array<() => void> = [];

  constructor(readonly name: string, private bus: Bus) {}

  onMessage(callback: (msg: MidiMessage) => void): () => void {
    // Wrap so the same callback can be subscribed twice and removed once.
    const listener = (msg: MidiMessage) => callback(msg);
    this.bus.listeners.add(listener);
    const unsubscribe = () => {
      this.bus.listeners.delete(listener);
    };
    this.subscriptions.push(unsubscribe);
    return unsubscribe;
  }

  close(): void {
    for (const unsubscribe of this.subscriptions) unsubscribe();
    this.subscriptions = [];
  }
}

class VirtualOutputPort implements MidiOutputPort {
  private closed = false;

  constructor(readonly name: string, private bus: Bus) {}

  send(msg: MidiMessage): void {
    if (this.closed) return;
    for (const listener of [...this.bus.listeners]) {
      listener(msg);
    }
  }

  close(): void {
    this.closed = true;
  }
}

export class VirtualMidiBackend implements MidiBackend {
  private buses: Map<string, Bus> = new Map();

  getInputNames(): string[] {
    return Array.from(this.buses.keys());
  }

  getOutputNames(): string[] {
    return Array.from(this.buses.keys());
  }

  openInput(name: string, options: OpenPortOptions): MidiInputPort {
    return new VirtualInputPort(name, this.getBus(name, options));
  }

  openOutput(name: string, options: OpenPortOptions): MidiOutputPort {
    return new VirtualOutputPort(name, this.getBus(name, options));
  }

  /**
   * Drop every bus. Ports opened earlier stay attached to their old buses.
   */
  reset(): void {
    this.buses.clear();
  }

  private getBus(name: string, options: OpenPortOptions): Bus {
    let bus = this.buses.get(name);
    if (!bus) {
      if (!options.virtual) {
        throw new Error(`No MIDI port named '${name}'`);
      }
      bus = { listeners: new Set() };
      this.buses.set(name, bus);
    }
    return bus;
  }
}

/** Process-wide bus registry shared by every component that opens ports by name. */
export const virtualMidi = new VirtualMidiBackend();
