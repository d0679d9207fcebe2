import { describe, it, expect, beforeEach, vi } from "vitest";
import { RawMidiInputPort, RawMidiOutputPort } from "../../src/midi/RawMidiPorts";
import type { MidiPacket, MidiSink, MidiSource } from "../../src/midi/MidiSource";
import type { MidiMessage } from "@antiphon/contracts";
import { noteOn } from "@antiphon/contracts";

/**
 * Mock byte-level MIDI source for testing.
 */
class MockMidiSource implements MidiSource {
  private listeners: Array<(packet: MidiPacket) => void> = [];
  disposed = false;

  onPacket(callback: (packet: MidiPacket) => void): () => void {
    this.listeners.push(callback);
    return () => {
      const idx = this.listeners.indexOf(callback);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  dispose(): void {
    this.disposed = true;
  }

  get listenerCount(): number {
    return this.listeners.length;
  }

  emit(data: number[], timestamp?: number): void {
    for (const listener of this.listeners) {
      listener({ data: new Uint8Array(data), timestamp });
    }
  }
}

class MockMidiSink implements MidiSink {
  written: number[][] = [];
  disposed = false;

  write(data: Uint8Array): void {
    this.written.push(Array.from(data));
  }

  dispose(): void {
    this.disposed = true;
  }
}

describe("RawMidiInputPort", () => {
  let source: MockMidiSource;
  let port: RawMidiInputPort;

  beforeEach(() => {
    source = new MockMidiSource();
    port = new RawMidiInputPort("Test Keyboard", source);
  });

  it("subscribes to the source on first listener only", () => {
    expect(source.listenerCount).toBe(0);
    port.onMessage(() => undefined);
    port.onMessage(() => undefined);
    expect(source.listenerCount).toBe(1);
  });

  it("decodes packets into messages", () => {
    const received: MidiMessage[] = [];
    port.onMessage((msg) => received.push(msg));

    source.emit([0x90, 60, 80], 3);

    expect(received).toEqual([{ type: "note_on", channel: 0, note: 60, velocity: 80, time: 3 }]);
  });

  it("drops packets the codec does not handle", () => {
    const listener = vi.fn();
    port.onMessage(listener);

    source.emit([0xe0, 0, 64]);

    expect(listener).not.toHaveBeenCalled();
  });

  it("stops delivering after unsubscribe", () => {
    const listener = vi.fn();
    const unsubscribe = port.onMessage(listener);
    unsubscribe();

    source.emit([0x90, 60, 80]);

    expect(listener).not.toHaveBeenCalled();
  });

  it("releases the source on close", () => {
    port.onMessage(() => undefined);
    port.close();

    expect(source.listenerCount).toBe(0);
    expect(source.disposed).toBe(true);
  });
});

describe("RawMidiOutputPort", () => {
  it("encodes sent messages", () => {
    const sink = new MockMidiSink();
    const port = new RawMidiOutputPort("Synth", sink);

    port.send(noteOn(64, 90, 1));

    expect(sink.written).toEqual([[0x91, 64, 90]]);
  });

  it("ignores sends after close", () => {
    const sink = new MockMidiSink();
    const port = new RawMidiOutputPort("Synth", sink);

    port.close();
    port.send(noteOn(64, 90, 1));

    expect(sink.written).toEqual([]);
    expect(sink.disposed).toBe(true);
  });
});
