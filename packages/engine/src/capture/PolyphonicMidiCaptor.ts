import type { NoteEvent, TimedMidiMessage } from "@antiphon/contracts";
import { isNoteEnd, isNoteStart } from "@antiphon/contracts";

import { MidiCaptor } from "./MidiCaptor";

/**
 * Captures any number of simultaneous notes, one per pitch.
 */
export class PolyphonicMidiCaptor extends MidiCaptor {
  /** Open notes keyed by pitch */
  private openNotes: Map<number, NoteEvent> = new Map();

  protected captureMessage(msg: TimedMidiMessage): void {
    if (isNoteStart(msg)) {
      if (this.openNotes.has(msg.note)) return;
      this.openNotes.set(msg.note, this.addNote(msg));
    } else if (isNoteEnd(msg)) {
      const open = this.openNotes.get(msg.note);
      if (!open) return;
      open.endTime = msg.time;
      this.openNotes.delete(msg.note);
    }
  }
}
