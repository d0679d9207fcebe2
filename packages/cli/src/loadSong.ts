import { readFile } from "node:fs/promises";
import type { Song } from "@antiphon/contracts";
import { ConfigurationError, parseSong } from "@antiphon/engine";

/**
 * Read a song file. Roman numerals are resolved in `key`.
 */
export async function loadSong(path: string, key = "C"): Promise<Song> {
  const text = await readFile(path, "utf-8");
  const song = parseSong(text, { key });
  if (song.length === 0) {
    throw new ConfigurationError(`Song '${path}' has no parts.`);
  }
  console.log(`[Antiphon] Loaded '${path}' with structure: ${song.map(String).join(", ")}`);
  return song;
}
