/**
 * antiphon: play along with a song from the command line.
 *
 *   antiphon --config perf.json [--song song.txt] [--output take.mid] [--qpm 100]
 */

import { parseArgs } from "node:util";

import { applyOverrides, loadConfig } from "./config";
import { loadSong } from "./loadSong";
import { PerformanceManager } from "./PerformanceManager";

const USAGE = `Usage: antiphon [--config <file>] [--song <file>] [--output <file.mid>] [--qpm <n>]

  -c, --config   JSON performance configuration
  -s, --song     song file (overrides "song" in the configuration)
  -o, --output   recording path (overrides "recording.path")
      --qpm      tempo (overrides "qpm")
  -h, --help     show this help`;

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      config: { type: "string", short: "c" },
      song: { type: "string", short: "s" },
      output: { type: "string", short: "o" },
      qpm: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const config = applyOverrides(await loadConfig(values.config), values);
  if (config.song === undefined) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const song = await loadSong(config.song, config.key);
  const manager = new PerformanceManager(config, song);
  manager.start();

  const interrupted = new Promise<"interrupted">((resolve) => {
    process.once("SIGINT", () => resolve("interrupted"));
  });

  try {
    const reason = await Promise.race([
      manager.finished().then(() => "finished" as const),
      interrupted,
    ]);
    console.log(reason === "finished" ? "[Antiphon] End of song." : "[Antiphon] Received SIGINT, stopping...");
  } finally {
    await manager.stop();
  }
}

main().catch((err: unknown) => {
  console.error("[Antiphon] Fatal:", err);
  process.exit(1);
});
