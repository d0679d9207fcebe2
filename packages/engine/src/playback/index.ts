export { MidiPlayer, type MidiPlayerConfig, type PlayerStopOptions } from "./MidiPlayer";
