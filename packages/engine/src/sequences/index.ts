export { adjustSequenceTimes, trimNoteSequence, clipSequence, lastNoteEnd } from "./sequenceUtils";
