export { ResponseCache, type CacheEntry } from "./ResponseCache";
export { computePushBackTicks } from "./latency";
export { buildChordSequence, type ChordSequenceOptions } from "./chordAccompaniment";
export {
  MidiInteraction,
  type InteractionControls,
  type MidiInteractionConfig,
} from "./MidiInteraction";
export {
  SongStructureInteraction,
  type SongStructureInteractionConfig,
  type SongStructureControls,
  type PlayerChannels,
} from "./SongStructureInteraction";
