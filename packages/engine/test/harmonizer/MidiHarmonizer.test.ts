import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { MidiMessage, MidiOutputPort } from "@antiphon/contracts";
import { controlChange, noteOff, noteOn } from "@antiphon/contracts";
import { VirtualMidiBackend } from "@antiphon/adapters";
import { MidiHarmonizer } from "../../src/harmonizer/MidiHarmonizer";
import { ProtocolStateError } from "../../src/errors";

describe("MidiHarmonizer", () => {
  let backend: VirtualMidiBackend;
  let relayed: MidiMessage[];
  let keys: MidiOutputPort;
  let harmonizer: MidiHarmonizer;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    backend = new VirtualMidiBackend();
    relayed = [];
    backend.openInput("harmonized", { virtual: true }).onMessage((msg) => relayed.push(msg));
    harmonizer = new MidiHarmonizer("performance", "harmonized", { backend });
    harmonizer.start();
    keys = backend.openOutput("performance", { virtual: false });
  });

  afterEach(() => {
    harmonizer.stop();
    vi.restoreAllMocks();
  });

  function playChord(notes: number[]): void {
    for (const note of notes) keys.send(noteOn(note, 80, 3));
  }

  it("relays chord and control messages unchanged", () => {
    playChord([60, 64, 67]);
    keys.send(controlChange(7, 100, 1));

    expect(relayed).toEqual([
      noteOn(60, 80, 3),
      noteOn(64, 80, 3),
      noteOn(67, 80, 3),
      controlChange(7, 100, 1),
    ]);
  });

  it("fits melody notes to the sounding chord", () => {
    playChord([60, 64, 67]);
    keys.send(noteOn(61, 100, 1));

    expect(relayed[relayed.length - 1]).toEqual(noteOn(50, 100, 1));
  });

  it("fits bass notes an octave lower", () => {
    playChord([60, 64, 67]);
    keys.send(noteOn(61, 100, 2));

    expect(relayed[relayed.length - 1]).toEqual(noteOn(38, 100, 2));
  });

  it("passes melody through and drops bass an octave without a chord", () => {
    keys.send(noteOn(61, 100, 1));
    keys.send(noteOn(61, 100, 2));

    expect(relayed).toEqual([noteOn(61, 100, 1), noteOn(49, 100, 2)]);
  });

  it("releases a held note at the pitch it was sent as", () => {
    playChord([60, 64, 67]);
    keys.send(noteOn(61, 100, 1));
    for (const note of [60, 64, 67]) keys.send(noteOff(note, 3));
    playChord([62, 65, 69]);
    keys.send(noteOff(61, 1));

    expect(relayed[relayed.length - 1]).toEqual(noteOff(50, 1));
  });

  it("reports each message with its rewrite", () => {
    harmonizer.stop();
    const callback = vi.fn();
    harmonizer = new MidiHarmonizer("performance", "harmonized", { backend, callback });
    harmonizer.start();

    keys.send(noteOn(61, 100, 1));

    expect(callback).toHaveBeenCalledWith(noteOn(61, 100, 1), noteOn(61, 100, 1));
  });

  it("cannot be restarted", () => {
    expect(() => harmonizer.start()).toThrow(ProtocolStateError);
  });

  it("stops relaying once stopped", () => {
    harmonizer.stop();
    keys.send(noteOn(61, 100, 1));

    expect(harmonizer.isRunning).toBe(false);
    expect(relayed).toEqual([]);
  });
});
