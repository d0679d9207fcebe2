/**
 * Abstraction over raw MIDI byte sources and sinks for dependency injection.
 * A host driver (hardware, OS virtual ports) implements these; the
 * RawMidi ports turn them into message-level ports.
 */

export interface MidiPacket {
  /** Raw MIDI data: [status, data1, data2] */
  data: Uint8Array;
  /** Arrival time in seconds, when the driver provides one */
  timestamp?: number;
}

export interface MidiSource {
  /**
   * Subscribe to packets from the source.
   * Returns an unsubscribe function.
   */
  onPacket(callback: (packet: MidiPacket) => void): () => void;

  /**
   * Clean up resources.
   */
  dispose?(): void;
}

export interface MidiSink {
  write(data: Uint8Array): void;
  dispose?(): void;
}
