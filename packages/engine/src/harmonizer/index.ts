export { fitNote, buildLattice, NoteFitter, type NoteLattice } from "./fitNote";
export { MidiState } from "./MidiState";
export { MidiHarmonizer, type MidiHarmonizerConfig } from "./MidiHarmonizer";
