/**
 * Port opening with virtual fallback: a named port the backend does not
 * list is created as a virtual port instead.
 */

import type { MidiBackend, MidiInputPort, MidiOutputPort } from "@antiphon/contracts";

import { virtualMidi } from "./VirtualMidiBackend";

export type PortRef<P> = string | P;

export function openInputPort(
  port: PortRef<MidiInputPort>,
  backend: MidiBackend = virtualMidi
): MidiInputPort {
  if (typeof port !== "string") return port;

  const virtual = !backend.getInputNames().includes(port);
  if (virtual) {
    console.log(`[Ports] Opening '${port}' as a virtual MIDI port for input.`);
  }
  return backend.openInput(port, { virtual });
}

export function openOutputPort(
  port: PortRef<MidiOutputPort>,
  backend: MidiBackend = virtualMidi
): MidiOutputPort {
  if (typeof port !== "string") return port;

  const virtual = !backend.getOutputNames().includes(port);
  if (virtual) {
    console.log(`[Ports] Opening '${port}' as a virtual MIDI port for output.`);
  }
  return backend.openOutput(port, { virtual });
}
