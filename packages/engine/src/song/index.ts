export {
  ProgressionPart,
  chordToMidi,
  resolveChordSymbol,
  CHORD_OCTAVE,
  DEFAULT_CHORD_BEATS,
} from "./ProgressionPart";
export { parseSong, type ParseSongOptions } from "./parseSong";
