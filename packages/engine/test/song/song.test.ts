import { describe, it, expect } from "vitest";
import {
  ProgressionPart,
  chordToMidi,
  resolveChordSymbol,
} from "../../src/song/ProgressionPart";
import { parseSong } from "../../src/song/parseSong";
import { ConfigurationError } from "../../src/errors";

describe("chordToMidi", () => {
  it("voices a triad upward from octave 3", () => {
    expect(chordToMidi("C")).toEqual([48, 52, 55]);
    expect(chordToMidi("F")).toEqual([53, 57, 60]);
  });

  it("voices seventh chords", () => {
    expect(chordToMidi("Am7")).toEqual([57, 60, 64, 67]);
  });

  it("takes another octave", () => {
    expect(chordToMidi("C", 4)).toEqual([60, 64, 67]);
  });

  it("rejects unknown symbols", () => {
    expect(() => chordToMidi("Hq")).toThrow("Unknown chord 'Hq'.");
  });
});

describe("resolveChordSymbol", () => {
  it("resolves Roman numerals in the chord's key", () => {
    expect(resolveChordSymbol({ symbol: "IV", key: "C", beats: 4 })).toBe("F");
    expect(resolveChordSymbol({ symbol: "V", key: "G", beats: 4 })).toBe("D");
  });

  it("passes chord symbols through", () => {
    expect(resolveChordSymbol({ symbol: "Am7", key: "G", beats: 4 })).toBe("Am7");
  });
});

describe("ProgressionPart", () => {
  it("lists the pitches of every chord", () => {
    const part = new ProgressionPart("verse", [
      { symbol: "C", key: "C", beats: 4 },
      { symbol: "IV", key: "C", beats: 2 },
    ]);
    expect(part.getMidiChords()).toEqual([
      [48, 52, 55],
      [53, 57, 60],
    ]);
    expect(String(part)).toBe("verse(C:4, IV:2)");
  });
});

describe("parseSong", () => {
  const text = [
    "# a short song",
    "verse, C, Am:2, F:2",
    "",
    "chorus, IV, V  # resolved in C",
    "verse",
  ].join("\n");

  it("reads one part per line", () => {
    const song = parseSong(text);

    expect(song.map((part) => part.name)).toEqual(["verse", "chorus", "verse"]);
    expect(song[0].chords).toEqual([
      { symbol: "C", key: "C", beats: 4 },
      { symbol: "Am", key: "C", beats: 2 },
      { symbol: "F", key: "C", beats: 2 },
    ]);
    expect(song[1].getMidiChords()).toEqual([
      [53, 57, 60],
      [55, 59, 62],
    ]);
  });

  it("reuses a part named again without chords", () => {
    const song = parseSong(text);
    expect(song[2]).toBe(song[0]);
  });

  it("resolves numerals in the given key", () => {
    const [part] = parseSong("intro, I, V", { key: "D" });
    expect(part.getMidiChords()).toEqual([
      [50, 54, 57],
      [57, 61, 64],
    ]);
  });

  it("names the line of a bad chord", () => {
    expect(() => parseSong("verse, C\nchorus, Hq")).toThrow(ConfigurationError);
    expect(() => parseSong("verse, C\nchorus, Hq")).toThrow("Line 2: Unknown chord 'Hq'.");
    expect(() => parseSong("verse, C:0")).toThrow("Line 1: invalid chord 'C:0'.");
  });

  it("rejects a line without a part name", () => {
    expect(() => parseSong(", C")).toThrow("Line 1: missing part name.");
  });
});
