import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { writeFile } from "node:fs/promises";
import type { MidiMessage } from "@antiphon/contracts";
import { VirtualMidiBackend } from "@antiphon/adapters";
import { ProtocolStateError, parseSong } from "@antiphon/engine";
import { parseConfig } from "../src/config";
import { PerformanceManager, defaultGenerators } from "../src/PerformanceManager";

vi.mock("node:fs/promises", () => ({
  readFile: vi.fn(),
  writeFile: vi.fn(async () => undefined),
}));

describe("PerformanceManager", () => {
  let backend: VirtualMidiBackend;
  let received: MidiMessage[];

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(1_000_000);
    for (const level of ["log", "warn", "debug"] as const) {
      vi.spyOn(console, level).mockImplementation(() => undefined);
    }
    backend = new VirtualMidiBackend();
    received = [];
    backend.openInput("synth", { virtual: true }).onMessage((msg) => received.push(msg));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  function noteOns(channel: number): MidiMessage[] {
    return received.filter((m) => m.type === "note_on" && m.channel === channel && m.velocity > 0);
  }

  it("plays a song through the harmonizer into the recording", async () => {
    const config = parseConfig({
      tickDuration: 1,
      partLength: 1,
      ports: { output: "synth" },
      recording: { path: "take.mid" },
    });
    const manager = new PerformanceManager(config, parseSong("verse, C"), { backend });

    manager.start();
    expect(manager.isRunning).toBe(true);
    // Instrument programs are selected first.
    expect(received.slice(0, 3).map((m) => m.type)).toEqual([
      "program_change",
      "program_change",
      "program_change",
    ]);

    await vi.advanceTimersByTimeAsync(2000);
    await manager.finished();

    // One bar of eighth notes per role.
    expect(noteOns(1)).toHaveLength(4);
    expect(noteOns(2)).toHaveLength(4);
    expect(noteOns(9)).toHaveLength(4);

    await expect(manager.stop()).resolves.toBe("take.mid");
    expect(manager.isRunning).toBe(false);
    expect(writeFile).toHaveBeenCalledWith("take.mid", expect.any(Uint8Array));
  });

  it("stops a running performance", async () => {
    const config = parseConfig({ tickDuration: 1, partLength: 4, ports: { output: "synth" } });
    const manager = new PerformanceManager(config, parseSong("verse, C\nchorus, F"), { backend });

    manager.start();
    await vi.advanceTimersByTimeAsync(1500);

    await expect(manager.stop()).resolves.toBe("recording.mid");
    const countAfterStop = received.length;
    await vi.advanceTimersByTimeAsync(5000);
    expect(received).toHaveLength(countAfterStop);
  });

  it("derives the tick from the tempo", () => {
    const manager = new PerformanceManager(parseConfig({ qpm: 96, beatsPerBar: 3 }), [], { backend });
    expect(manager.tickDuration).toBe(1.875);
  });

  it("guards its lifecycle", async () => {
    const config = parseConfig({ tickDuration: 1, ports: { output: "synth" } });
    const manager = new PerformanceManager(config, parseSong("verse, C"), { backend });

    await expect(manager.stop()).rejects.toThrow(ProtocolStateError);
    manager.start();
    expect(() => manager.start()).toThrow("The performance is already running.");
    await manager.stop();
  });

  it("builds one generator per role", () => {
    expect(defaultGenerators(3).map((g) => g.id)).toEqual([
      "random_walk_melody",
      "random_walk_bass",
      "random_walk_drums",
    ]);
  });
});
