import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { NoteSequence } from "@antiphon/contracts";
import { controlChange, noteOff, noteOn } from "@antiphon/contracts";
import { MonophonicMidiCaptor } from "../../src/capture/MonophonicMidiCaptor";
import { PolyphonicMidiCaptor } from "../../src/capture/PolyphonicMidiCaptor";
import { ConfigurationError, ProtocolStateError } from "../../src/errors";

/** Let queued messages reach the capture loop. */
async function flush(): Promise<void> {
  await vi.advanceTimersByTimeAsync(0);
}

describe("MidiCaptor", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(1_000_000);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe("PolyphonicMidiCaptor", () => {
    it("tracks one open note per pitch", async () => {
      const captor = new PolyphonicMidiCaptor({ qpm: 120, startTime: 999 });
      captor.start();

      captor.receive(noteOn(60, 100, 0, 999.25));
      captor.receive(noteOn(64, 90, 0, 999.5));
      captor.receive(noteOff(67, 0, 999.625)); // never opened
      captor.receive(noteOff(60, 0, 999.75));
      captor.receive(noteOn(64, 80, 0, 999.875)); // already sounding

      await captor.stop();

      expect(captor.capturedSequence()).toEqual({
        notes: [
          { pitch: 60, velocity: 100, startTime: 999.25, endTime: 999.75, isDrum: false },
          { pitch: 64, velocity: 90, startTime: 999.5, endTime: 1000, isDrum: false },
        ],
        totalTime: 1000,
        qpm: 120,
      });
    });

    it("treats a zero-velocity note_on as a release", async () => {
      const captor = new PolyphonicMidiCaptor({ qpm: 120, startTime: 999 });
      captor.start();

      captor.receive(noteOn(60, 100, 0, 999.25));
      captor.receive(noteOn(60, 0, 0, 999.5));

      await captor.stop();

      expect(captor.capturedSequence().notes).toEqual([
        { pitch: 60, velocity: 100, startTime: 999.25, endTime: 999.5, isDrum: false },
      ]);
    });

    it("flags notes on the drum channel", async () => {
      const captor = new PolyphonicMidiCaptor({ qpm: 120, startTime: 999 });
      captor.start();

      captor.receive(noteOn(36, 100, 9, 999.25));
      captor.receive(noteOff(36, 9, 999.5));

      await captor.stop();

      expect(captor.capturedSequence().notes[0].isDrum).toBe(true);
    });

    it("ignores messages at or before the start time", async () => {
      const captor = new PolyphonicMidiCaptor({ qpm: 120, startTime: 999.5 });
      captor.start();

      captor.receive(noteOn(60, 100, 0, 999.25));
      captor.receive(noteOn(62, 100, 0, 999.5));
      captor.receive(noteOn(64, 100, 0, 999.75));

      await captor.stop();

      expect(captor.capturedSequence().notes.map((n) => n.pitch)).toEqual([64]);
    });

    it("rejects untimed messages", () => {
      const captor = new PolyphonicMidiCaptor({ qpm: 120 });
      expect(() => captor.receive(noteOn(60, 100))).toThrow(ConfigurationError);
      expect(() => captor.receive(noteOn(60, 100, 0, 0))).toThrow(
        "MidiCaptor received message with empty time attribute: note_on"
      );
    });
  });

  describe("MonophonicMidiCaptor", () => {
    it("keeps at most one note open", async () => {
      const captor = new MonophonicMidiCaptor({ qpm: 100, startTime: 999 });
      captor.start();

      captor.receive(noteOn(60, 100, 0, 999.125));
      captor.receive(noteOn(62, 100, 0, 999.25)); // closes 60
      captor.receive(noteOn(62, 110, 0, 999.375)); // same pitch, ignored
      captor.receive(noteOff(60, 0, 999.5)); // not the open note
      captor.receive(noteOff(62, 0, 999.625));

      await captor.stop();

      expect(captor.capturedSequence()).toEqual({
        notes: [
          { pitch: 60, velocity: 100, startTime: 999.125, endTime: 999.25, isDrum: false },
          { pitch: 62, velocity: 100, startTime: 999.25, endTime: 999.625, isDrum: false },
        ],
        totalTime: 1000,
        qpm: 100,
      });
    });
  });

  describe("capturedSequence", () => {
    it("needs an end time while capturing", async () => {
      const captor = new PolyphonicMidiCaptor({ qpm: 120, startTime: 999 });
      captor.start();
      captor.receive(noteOn(60, 100, 0, 999.25));
      captor.receive(noteOn(62, 100, 0, 999.75));
      await flush();

      expect(() => captor.capturedSequence()).toThrow(ProtocolStateError);

      const snapshot = captor.capturedSequence(999.5);
      expect(snapshot.totalTime).toBe(999.5);
      expect(snapshot.notes).toEqual([
        { pitch: 60, velocity: 100, startTime: 999.25, endTime: 999.5, isDrum: false },
      ]);

      await captor.stop();
      expect(() => captor.capturedSequence(1000)).toThrow(
        "`endTime` must not be provided when capture is complete."
      );
    });

    it("drops earlier notes when the start time moves forward", async () => {
      const captor = new PolyphonicMidiCaptor({ qpm: 120, startTime: 999 });
      captor.start();
      captor.receive(noteOn(60, 100, 0, 999.25));
      captor.receive(noteOn(62, 100, 0, 999.75));
      await flush();

      captor.startTime = 999.5;

      await captor.stop();
      expect(captor.capturedSequence().notes.map((n) => n.pitch)).toEqual([62]);
    });
  });

  describe("stopping", () => {
    it("stops on the stop signal, ending at the last message", async () => {
      const captor = new PolyphonicMidiCaptor({
        qpm: 120,
        startTime: 999,
        stopSignal: { type: "control_change", control: 1 },
      });
      captor.start();

      captor.receive(noteOn(60, 100, 0, 999.25));
      captor.receive(controlChange(1, 127, 0, 999.5));
      await captor.join();

      expect(captor.state).toBe("stopped");
      expect(captor.capturedSequence()).toEqual({
        notes: [{ pitch: 60, velocity: 100, startTime: 999.25, endTime: 999.5, isDrum: false }],
        totalTime: 999.5,
        qpm: 120,
      });
    });

    it("stops by itself at the configured stop time", async () => {
      const captor = new PolyphonicMidiCaptor({ qpm: 120, startTime: 999, stopTime: 1002 });
      captor.start();
      captor.receive(noteOn(60, 100, 0, 1000.5));

      await vi.advanceTimersByTimeAsync(1999);
      expect(captor.isAlive()).toBe(true);
      await vi.advanceTimersByTimeAsync(1);
      await captor.join();

      expect(captor.capturedSequence().totalTime).toBe(1002);
    });

    it("allows a second stop only without a stop time", async () => {
      const captor = new PolyphonicMidiCaptor({ qpm: 120 });
      captor.start();

      await captor.stop();

      expect(() => captor.stop({ stopTime: 1005 })).toThrow(ProtocolStateError);
      await expect(captor.stop()).resolves.toBeUndefined();
    });
  });

  describe("iterate", () => {
    it("yields one snapshot per period and then the final sequence", async () => {
      const captor = new PolyphonicMidiCaptor({ qpm: 120, startTime: 1000 });
      captor.start();
      // 3.3 periods of 2.5s each.
      await captor.stop({ stopTime: 1008.25, block: false });

      const totals: number[] = [];
      const consumer = (async () => {
        for await (const sequence of captor.iterate({ period: 2.5 })) {
          totals.push(sequence.totalTime);
        }
      })();

      await vi.advanceTimersByTimeAsync(10_000);
      await consumer;

      expect(totals).toEqual([1002.5, 1005, 1007.5, 1008.25]);
    });

    it("only yields the final sequence once capture is over", async () => {
      const captor = new PolyphonicMidiCaptor({ qpm: 120 });
      captor.start();
      await captor.stop();

      const sequences: NoteSequence[] = [];
      for await (const sequence of captor.iterate({ period: 1 })) {
        sequences.push(sequence);
      }
      for await (const sequence of captor.iterate({ signal: { note: 60 } })) {
        sequences.push(sequence);
      }

      expect(sequences.map((s) => s.totalTime)).toEqual([1000, 1000]);
    });

    it("yields a snapshot at each matching message", async () => {
      const captor = new PolyphonicMidiCaptor({ qpm: 120, startTime: 999 });
      captor.start();

      const snapshots: NoteSequence[] = [];
      const consumer = (async () => {
        for await (const sequence of captor.iterate({ signal: { type: "note_off" } })) {
          snapshots.push(sequence);
        }
      })();

      captor.receive(noteOn(60, 100, 0, 999.25));
      captor.receive(noteOff(60, 0, 999.5));
      captor.receive(noteOn(62, 100, 0, 999.75));
      await flush();

      await captor.stop();
      await consumer;

      expect(snapshots.map((s) => s.totalTime)).toEqual([999.5, 1000]);
      expect(snapshots[0].notes).toEqual([
        { pitch: 60, velocity: 100, startTime: 999.25, endTime: 999.5, isDrum: false },
      ]);
      expect(snapshots[1].notes.map((n) => n.pitch)).toEqual([60, 62]);
    });

    it("ends a signal series early when its waiters are woken", async () => {
      const captor = new PolyphonicMidiCaptor({ qpm: 120, startTime: 999 });
      captor.start();

      let finished = false;
      const totals: number[] = [];
      const consumer = (async () => {
        for await (const sequence of captor.iterate({ signal: { note: 60 } })) {
          totals.push(sequence.totalTime);
        }
        finished = true;
      })();

      captor.wakeSignalWaiters({ note: 60 });
      await flush();
      // The series waits for capture to end before its final yield.
      expect(finished).toBe(false);

      await captor.stop();
      await consumer;
      expect(totals).toEqual([1000]);
    });

    it("rejects a non-positive period", () => {
      const captor = new PolyphonicMidiCaptor({ qpm: 120 });
      expect(() => captor.iterate({ period: 0 })).toThrow("`period` must be positive.");
    });
  });

  describe("registerCallback", () => {
    it("calls back with each snapshot and can be cancelled", async () => {
      const captor = new PolyphonicMidiCaptor({ qpm: 120, startTime: 999 });
      captor.start();

      const seen = vi.fn();
      const name = captor.registerCallback(seen, { signal: { type: "note_on" } });
      expect(name).toBe(`${captor.name}-callback-1`);

      captor.receive(noteOn(60, 100, 0, 999.25));
      captor.receive(noteOn(62, 100, 0, 999.5));
      await flush();
      expect(seen).toHaveBeenCalledTimes(2);

      captor.cancelCallback(name);
      captor.receive(noteOn(64, 100, 0, 999.75));
      await flush();
      expect(seen).toHaveBeenCalledTimes(2);

      await captor.stop();
    });

    it("rejects unknown callback names", () => {
      const captor = new PolyphonicMidiCaptor({ qpm: 120 });
      expect(() => captor.cancelCallback("missing")).toThrow("No callback named 'missing'.");
    });

    it("logs a failing callback and keeps iterating", async () => {
      const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
      const captor = new PolyphonicMidiCaptor({ qpm: 120, startTime: 999 });
      captor.start();

      const seen = vi.fn(() => {
        throw new Error("listener failed");
      });
      captor.registerCallback(seen, { signal: { type: "note_on" } });

      captor.receive(noteOn(60, 100, 0, 999.25));
      captor.receive(noteOn(62, 100, 0, 999.5));
      await flush();

      expect(seen).toHaveBeenCalledTimes(2);
      expect(error).toHaveBeenCalledTimes(2);
      await captor.stop();
    });
  });
});
