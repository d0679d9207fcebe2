import type { MidiMessage, MidiOutputPort } from "@antiphon/contracts";

/**
 * Fans every sent message out to a set of ports, in order.
 */
export class MultiOutputPort implements MidiOutputPort {
  readonly name: string;

  constructor(private ports: MidiOutputPort[]) {
    this.name = ports.map((p) => p.name).join(", ");
  }

  send(msg: MidiMessage): void {
    for (const port of this.ports) {
      port.send(msg);
    }
  }

  close(): void {
    for (const port of this.ports) {
      port.close();
    }
  }
}
