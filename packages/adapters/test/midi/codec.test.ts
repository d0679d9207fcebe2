import { describe, it, expect } from "vitest";
import { decodeMidi, encodeMidi } from "../../src/midi/codec";
import { controlChange, noteOff, noteOn, programChange } from "@antiphon/contracts";

describe("decodeMidi", () => {
  it("decodes note on with channel and time", () => {
    expect(decodeMidi(new Uint8Array([0x93, 60, 100]), 12.5)).toEqual({
      type: "note_on",
      channel: 3,
      note: 60,
      velocity: 100,
      time: 12.5,
    });
  });

  it("leaves time unset when none is given", () => {
    const msg = decodeMidi(new Uint8Array([0x80, 64, 0]));
    expect(msg).toEqual({ type: "note_off", channel: 0, note: 64, velocity: 0 });
    expect(msg && "time" in msg).toBe(false);
  });

  it("decodes control and program changes", () => {
    expect(decodeMidi(new Uint8Array([0xb1, 7, 90]))).toEqual({
      type: "control_change",
      channel: 1,
      control: 7,
      value: 90,
    });
    expect(decodeMidi(new Uint8Array([0xc9, 12]))).toEqual({
      type: "program_change",
      channel: 9,
      program: 12,
    });
  });

  it("returns null for unsupported or short packets", () => {
    expect(decodeMidi(new Uint8Array([0xe0, 0, 64]))).toBeNull();
    expect(decodeMidi(new Uint8Array([0xf8]))).toBeNull();
  });
});

describe("encodeMidi", () => {
  it("encodes every message type", () => {
    expect(Array.from(encodeMidi(noteOn(60, 100, 2)))).toEqual([0x92, 60, 100]);
    expect(Array.from(encodeMidi(noteOff(60, 2)))).toEqual([0x82, 60, 0]);
    expect(Array.from(encodeMidi(controlChange(64, 127, 15)))).toEqual([0xbf, 64, 127]);
    expect(Array.from(encodeMidi(programChange(57, 1)))).toEqual([0xc1, 57]);
  });

  it("is read back by decodeMidi", () => {
    const msg = controlChange(20, 5, 4);
    expect(decodeMidi(encodeMidi(msg))).toEqual(msg);
  });
});
