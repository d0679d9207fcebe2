import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { readFile } from "node:fs/promises";
import { loadSong } from "../src/loadSong";

vi.mock("node:fs/promises", () => ({
  readFile: vi.fn(),
}));

describe("loadSong", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("parses the file in the given key", async () => {
    vi.mocked(readFile).mockResolvedValue("verse, I, V\nverse\n");

    const song = await loadSong("song.txt", "G");

    expect(readFile).toHaveBeenCalledWith("song.txt", "utf-8");
    expect(song).toHaveLength(2);
    expect(song[1]).toBe(song[0]);
    expect(song[0].getMidiChords()).toEqual([
      [55, 59, 62],
      [50, 54, 57],
    ]);
    expect(console.log).toHaveBeenCalledWith(
      "[Antiphon] Loaded 'song.txt' with structure: verse(I:4, V:4), verse(I:4, V:4)"
    );
  });

  it("rejects an empty song", async () => {
    vi.mocked(readFile).mockResolvedValue("# nothing yet\n");
    await expect(loadSong("empty.txt")).rejects.toThrow("Song 'empty.txt' has no parts.");
  });
});
