import { describe, it, expect } from "vitest";
import { NoteFitter, buildLattice, fitNote } from "../../src/harmonizer/fitNote";

const C_MAJOR = [60, 64, 67];

describe("fitNote", () => {
  it("leaves notes alone without a chord", () => {
    expect(fitNote(61, [])).toBe(61);
    expect(fitNote(0, [])).toBe(0);
    expect(fitNote(127, [])).toBe(127);
  });

  it("maps notes around the melodic center onto the upper set", () => {
    expect(fitNote(60, C_MAJOR)).toBe(48);
    expect(fitNote(61, C_MAJOR)).toBe(50);
    expect(fitNote(62, C_MAJOR)).toBe(52);
  });

  it("maps notes below the center onto the lower set", () => {
    expect(fitNote(59, C_MAJOR)).toBe(47);
    expect(fitNote(58, C_MAJOR)).toBe(45);
  });

  it("stays within the MIDI range", () => {
    const chords = [C_MAJOR, [61, 65, 68], [0], [127], [30, 90, 110]];
    for (const chord of chords) {
      for (let note = 0; note <= 127; note++) {
        const fitted = fitNote(note, chord);
        expect(fitted).toBeGreaterThanOrEqual(0);
        expect(fitted).toBeLessThanOrEqual(127);
      }
    }
  });

  it("builds sorted sets without duplicates", () => {
    const { below, above } = buildLattice(C_MAJOR);
    expect(below).toHaveLength(28);
    expect(above).toHaveLength(49);
    expect(below[0]).toBe(0);
    expect(below[below.length - 1]).toBe(47);
    expect(above[0]).toBe(48);
    expect([...above].sort((a, b) => a - b)).toEqual(above);
  });

  it("adds chord tones outside the scale", () => {
    const { above } = buildLattice([61, 65, 68]);
    expect(above).toContain(49);
    expect(above).toContain(56);
  });
});

describe("NoteFitter", () => {
  it("agrees with fitNote across chord changes", () => {
    const fitter = new NoteFitter();
    const chords = [C_MAJOR, [67, 60, 64], [62, 65, 69], []];
    for (const chord of chords) {
      for (const note of [0, 40, 59, 60, 61, 72, 100, 127]) {
        expect(fitter.fit(note, chord)).toBe(fitNote(note, chord));
      }
    }
  });
});
