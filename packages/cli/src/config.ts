/**
 * Performance configuration.
 *
 * A JSON file validated against `PerformanceConfigSchema`. Every field has
 * a default, so `{}` is a valid configuration; only the song path must be
 * given somewhere (file or `--song`).
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigurationError } from "@antiphon/engine";

const midiValue = z.number().int().min(0).max(127);
const midiChannel = z.number().int().min(0).max(15);

export const SignalSpecSchema = z
  .object({
    type: z.enum(["note_on", "note_off", "control_change"]).optional(),
    channel: midiChannel.optional(),
    note: midiValue.optional(),
    velocity: midiValue.optional(),
    control: midiValue.optional(),
    value: midiValue.optional(),
  })
  .strict();

export const PerformanceConfigSchema = z
  .object({
    /** Song file, one part per line */
    song: z.string().min(1).optional(),
    /** Key Roman numerals in the song are resolved in */
    key: z.string().default("C"),
    qpm: z.number().positive().default(120),
    /** Seconds per tick; defaults to one bar at `qpm` */
    tickDuration: z.number().positive().optional(),
    partLength: z.number().int().positive().default(8),
    beatsPerBar: z.number().int().positive().default(4),
    texture: z.enum(["monophonic", "polyphonic"]).default("monophonic"),
    chordPassthrough: z.boolean().default(false),
    metronomeChannel: midiChannel.optional(),
    /** Seed of the random-walk generators */
    seed: z.number().int().default(1),
    ports: z
      .object({
        inputs: z.array(z.string()).default([]),
        harmonizerInput: z.string().default("antiphon-harmonizer-in"),
        harmonizerOutput: z.string().default("antiphon-harmonizer-out"),
        output: z.string().default("antiphon-out"),
      })
      .strict()
      .default({}),
    channels: z
      .object({
        melody: midiChannel,
        bass: midiChannel,
        chords: midiChannel,
        drums: midiChannel,
      })
      .partial()
      .strict()
      .default({}),
    recording: z
      .object({
        path: z.string().min(1).default("recording.mid"),
        bpm: z.number().positive().default(120),
      })
      .strict()
      .default({}),
    controls: z
      .object({
        generatorSelect: midiValue,
        tempo: midiValue,
        temperature: midiValue,
        minListenTicks: midiValue,
        maxListenTicks: midiValue,
        responseTicks: midiValue,
        loop: midiValue,
        state: midiValue,
      })
      .partial()
      .strict()
      .default({}),
    signals: z
      .object({
        clock: SignalSpecSchema.optional(),
        endCall: SignalSpecSchema.optional(),
        panic: SignalSpecSchema.optional(),
      })
      .strict()
      .default({}),
  })
  .strict();

export type PerformanceConfig = z.infer<typeof PerformanceConfigSchema>;

/** Overrides given on the command line. */
export interface ConfigOverrides {
  song?: string;
  output?: string;
  qpm?: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  ${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("\n");
}

/**
 * Validate a parsed JSON value.
 *
 * @throws ConfigurationError listing every issue
 */
export function parseConfig(raw: unknown): PerformanceConfig {
  const result = PerformanceConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Apply command-line overrides to a validated configuration.
 */
export function applyOverrides(config: PerformanceConfig, overrides: ConfigOverrides): PerformanceConfig {
  let qpm = config.qpm;
  if (overrides.qpm !== undefined) {
    const parsed = z.coerce.number().positive().safeParse(overrides.qpm);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid --qpm '${overrides.qpm}': ${parsed.error.issues[0]?.message ?? "not a number"}`);
    }
    qpm = parsed.data;
  }
  return {
    ...config,
    qpm,
    song: overrides.song ?? config.song,
    recording: { ...config.recording, path: overrides.output ?? config.recording.path },
  };
}

/**
 * Read and validate a configuration file. Without a path, the defaults.
 */
export async function loadConfig(path?: string): Promise<PerformanceConfig> {
  if (path === undefined) return parseConfig({});

  const text = await readFile(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(
      `Could not parse ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseConfig(raw);
}
