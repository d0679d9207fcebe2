import type { NoteEvent, TimedMidiMessage } from "@antiphon/contracts";
import { isNoteEnd, isNoteStart } from "@antiphon/contracts";

import { MidiCaptor } from "./MidiCaptor";

/**
 * Captures at most one sounding note at a time. A new note_on closes the
 * open note; a repeated note_on for the open pitch is ignored.
 */
export class MonophonicMidiCaptor extends MidiCaptor {
  private openNote: NoteEvent | null = null;

  protected captureMessage(msg: TimedMidiMessage): void {
    if (isNoteStart(msg)) {
      if (this.openNote !== null) {
        if (this.openNote.pitch === msg.note) return;
        this.openNote.endTime = msg.time;
      }
      this.openNote = this.addNote(msg);
    } else if (isNoteEnd(msg)) {
      if (this.openNote === null || msg.note !== this.openNote.pitch) return;
      this.openNote.endTime = msg.time;
      this.openNote = null;
    }
  }
}
