export {
  RandomWalkGenerator,
  MELODY_PITCHES,
  BASS_PITCHES,
  DRUM_KIT,
  type RandomWalkConfig,
} from "./RandomWalkGenerator";
