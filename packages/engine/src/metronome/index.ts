export { Metronome, type MetronomeConfig } from "./Metronome";
