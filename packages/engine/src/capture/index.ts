export {
  MidiCaptor,
  type MidiCaptorConfig,
  type IterateOptions,
  type StopOptions,
} from "./MidiCaptor";
export { MonophonicMidiCaptor } from "./MonophonicMidiCaptor";
export { PolyphonicMidiCaptor } from "./PolyphonicMidiCaptor";
