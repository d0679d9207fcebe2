/**
 * Raw MIDI Ports
 *
 * Message-level ports over a byte-level driver. Packets the codec does not
 * understand are dropped.
 */

import type { MidiInputPort, MidiMessage, MidiOutputPort } from "@antiphon/contracts";

import { decodeMidi, encodeMidi } from "./codec";
import type { MidiSink, MidiSource, MidiPacket } from "./MidiSource";

export class RawMidiInputPort implements MidiInputPort {
  readonly name: string;

  private source: MidiSource;
  private unsubscribe: (() => void) | null = null;
  private listeners: Array<(msg: MidiMessage) => void> = [];

  constructor(name: string, source: MidiSource) {
    this.name = name;
    this.source = source;
  }

  onMessage(callback: (msg: MidiMessage) => void): () => void {
    this.listeners.push(callback);
    if (!this.unsubscribe) {
      this.unsubscribe = this.source.onPacket((packet) => this.handlePacket(packet));
    }
    return () => {
      const idx = this.listeners.indexOf(callback);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  close(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
    this.listeners = [];
    this.source.dispose?.();
  }

  private handlePacket(packet: MidiPacket): void {
    const msg = decodeMidi(packet.data, packet.timestamp);
    if (!msg) return;
    for (const listener of [...this.listeners]) {
      listener(msg);
    }
  }
}

export class RawMidiOutputPort implements MidiOutputPort {
  readonly name: string;

  private sink: MidiSink;
  private closed = false;

  constructor(name: string, sink: MidiSink) {
    this.name = name;
    this.sink = sink;
  }

  send(msg: MidiMessage): void {
    if (this.closed) return;
    this.sink.write(encodeMidi(msg));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.sink.dispose?.();
  }
}
