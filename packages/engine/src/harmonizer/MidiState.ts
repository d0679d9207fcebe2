import type { MidiMessage } from "@antiphon/contracts";
import { isNoteEnd, isNoteStart } from "@antiphon/contracts";

const CHANNEL_COUNT = 16;

/**
 * Sounding notes per channel, as seen by a stream of messages.
 */
export class MidiState {
  private channels: Array<Set<number>> = MidiState.emptyChannels();

  handleMessage(msg: MidiMessage): void {
    const notes = this.channels[msg.channel];
    if (!notes) return;
    if (isNoteStart(msg)) {
      notes.add(msg.note);
    } else if (isNoteEnd(msg)) {
      notes.delete(msg.note);
    }
  }

  activeNotes(channel: number): number[] {
    return [...(this.channels[channel] ?? [])];
  }

  reset(): void {
    this.channels = MidiState.emptyChannels();
  }

  private static emptyChannels(): Array<Set<number>> {
    return Array.from({ length: CHANNEL_COUNT }, () => new Set<number>());
  }
}
