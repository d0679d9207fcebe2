export type { MidiSource, MidiSink, MidiPacket } from "./MidiSource";
export { decodeMidi, encodeMidi } from "./codec";
export { RawMidiInputPort, RawMidiOutputPort } from "./RawMidiPorts";
export { VirtualMidiBackend, virtualMidi } from "./VirtualMidiBackend";
export { MultiOutputPort } from "./MultiOutputPort";
export { openInputPort, openOutputPort, type PortRef } from "./openPorts";
