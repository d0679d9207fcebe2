export { MidiSignal, toSignal, type SignalLike } from "./MidiSignal";
export {
  MidiHub,
  type MidiHubConfig,
  type HubCallback,
  type CaptureOptions,
  type PlaybackOptions,
  type MetronomeOptions,
  type WaitOptions,
} from "./MidiHub";
