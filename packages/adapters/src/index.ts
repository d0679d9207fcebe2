export * from "./midi";
export { MidiRecorder, RECORDED_CHANNELS, RECORDER_PPQ, type MidiRecorderConfig } from "./recording/MidiRecorder";
