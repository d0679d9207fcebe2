/**
 * MIDI Captor
 *
 * A background task that turns a live stream of timestamped messages into
 * a NoteSequence. Subclasses decide how note_on/note_off pairs open and
 * close notes.
 *
 * Consumers read the capture either as one-off snapshots
 * (`capturedSequence`), as a lazy series of snapshots (`iterate`), or via a
 * callback driven by such a series (`registerCallback`).
 */

import type {
  NoteEvent,
  NoteOnMessage,
  NoteSequence,
  Qpm,
  Seconds,
  TimedMidiMessage,
  MidiMessage,
} from "@antiphon/contracts";
import { DRUM_CHANNEL, cloneSequence, hasTime } from "@antiphon/contracts";

import { AsyncQueue, QUEUE_TIMEOUT } from "../concurrency/AsyncQueue";
import { BackgroundTask } from "../concurrency/BackgroundTask";
import { now, sleepUntil } from "../concurrency/clock";
import { ConfigurationError, ProtocolStateError, requireExactlyOne } from "../errors";
import { MidiSignal, toSignal, type SignalLike } from "../hub/MidiSignal";
import { clipSequence } from "../sequences/sequenceUtils";

/**
 * Configuration for a captor.
 */
export interface MidiCaptorConfig {
  /** Tempo recorded on the captured sequence */
  qpm: Qpm;

  /**
   * Messages at or before this time are ignored.
   * @default 0
   */
  startTime?: Seconds;

  /** Capture ends once this wall-clock time passes. */
  stopTime?: Seconds;

  /** Capture ends on the first message matching this signal. */
  stopSignal?: SignalLike;
}

/** Exactly one of `signal` or `period`. */
export type IterateOptions =
  | { signal: SignalLike; period?: undefined }
  | { period: Seconds; signal?: undefined };

export interface StopOptions {
  /** @default now */
  stopTime?: Seconds;
  /** @default true */
  block?: boolean;
}

/** Queued to wake a waiting consumer without a message. */
const WAKE: unique symbol = Symbol("wake");

type QueueItem = TimedMidiMessage | typeof WAKE;

interface IteratorSubscription {
  signal: MidiSignal;
  queue: AsyncQueue<QueueItem>;
}

interface CallbackHandle {
  cancelled: boolean;
}

export abstract class MidiCaptor extends BackgroundTask {
  private receiveQueue = new AsyncQueue<QueueItem>();
  private captured: NoteSequence;
  private _startTime: Seconds;
  private stopTime: Seconds | undefined;
  private stopSignal: MidiSignal | null;

  /** Signals being watched by `iterate` consumers */
  private iterSubscriptions: IteratorSubscription[] = [];

  /** Set once the final sequence has been stored */
  private finalized = false;
  private stopRequested = false;
  private callbacks: Map<string, CallbackHandle> = new Map();
  private callbackCount = 0;

  constructor(config: MidiCaptorConfig) {
    super("captor");
    this.captured = { notes: [], totalTime: 0, qpm: config.qpm };
    this._startTime = config.startTime ?? 0;
    this.stopTime = config.stopTime;
    this.stopSignal = config.stopSignal ? toSignal(config.stopSignal) : null;
  }

  get startTime(): Seconds {
    return this._startTime;
  }

  /**
   * Moving the start time forward discards captured notes that start
   * before it.
   */
  set startTime(value: Seconds) {
    this._startTime = value;
    const keepFrom = this.captured.notes.findIndex((note) => note.startTime >= value);
    this.captured.notes.splice(0, keepFrom < 0 ? this.captured.notes.length : keepFrom);
  }

  /**
   * Queue a message for capture.
   *
   * @throws ConfigurationError if the message has no timestamp
   */
  receive(msg: MidiMessage): void {
    if (!hasTime(msg) || !msg.time) {
      throw new ConfigurationError(
        `MidiCaptor received message with empty time attribute: ${msg.type}`
      );
    }
    this.receiveQueue.put(msg);
  }

  /**
   * Request the capture to end at `stopTime` (default: now).
   *
   * A second stop with an explicit `stopTime` is an error; a second stop
   * without one only waits for the task.
   */
  stop(options: StopOptions = {}): Promise<void> {
    const { stopTime, block = true } = options;
    if (this.stopRequested) {
      if (stopTime !== undefined) {
        throw new ProtocolStateError(
          "`stop` must not be called multiple times with a `stopTime` on MidiCaptor."
        );
      }
    } else {
      this.stopRequested = true;
      this.stopTime = stopTime ?? now();
      // Force the loop to re-read the stop time.
      this.receiveQueue.put(WAKE);
    }
    return block ? this.join() : Promise.resolve();
  }

  /**
   * Snapshot of the capture. While capturing, `endTime` is required and
   * bounds the snapshot; once capture has ended it must be omitted and the
   * final sequence is returned.
   */
  capturedSequence(endTime?: Seconds): NoteSequence {
    if (this.capturing) {
      if (endTime === undefined) {
        throw new ProtocolStateError(
          "`endTime` must be provided when capture is still running."
        );
      }
      return clipSequence(this.captured, endTime);
    }
    if (endTime !== undefined) {
      throw new ProtocolStateError("`endTime` must not be provided when capture is complete.");
    }
    return cloneSequence(this.captured);
  }

  /**
   * Lazy series of snapshots, one per `period` seconds or one per message
   * matching `signal`, always ending with the final sequence once capture
   * has ended. Not restartable: after the captor has stopped, a new
   * iteration yields only the final sequence.
   */
  iterate(options: IterateOptions): AsyncGenerator<NoteSequence> {
    requireExactlyOne({ signal: options.signal, period: options.period }, "iterate");
    if (options.signal !== undefined) {
      return this.iterateSignal(this.subscribe(toSignal(options.signal)));
    }
    if (options.period === undefined || options.period <= 0) {
      throw new ConfigurationError("`period` must be positive.");
    }
    return this.iteratePeriod(options.period);
  }

  /**
   * Call `fn` with every snapshot of an `iterate` series. Returns a name
   * for `cancelCallback`.
   */
  registerCallback(fn: (sequence: NoteSequence) => void, options: IterateOptions): string {
    const iterator = this.iterate(options);
    const name = `${this.name}-callback-${++this.callbackCount}`;
    const handle: CallbackHandle = { cancelled: false };
    this.callbacks.set(name, handle);

    this.driveCallback(iterator, fn, handle).catch((err: unknown) => {
      console.error(`[MidiCaptor] Callback '${name}' ended with an error:`, err);
    });
    return name;
  }

  /**
   * Stop a registered callback before its next snapshot. Does not wait.
   */
  cancelCallback(name: string): void {
    const handle = this.callbacks.get(name);
    if (!handle) {
      throw new ProtocolStateError(`No callback named '${name}'.`);
    }
    handle.cancelled = true;
    this.callbacks.delete(name);
  }

  /**
   * End `iterate` series waiting on `signal` (or all signal series). They
   * finish with the final sequence once capture ends.
   */
  wakeSignalWaiters(signal?: SignalLike): void {
    const key = signal === undefined ? undefined : toSignal(signal).key;
    for (const subscription of this.iterSubscriptions) {
      if (key === undefined || subscription.signal.key === key) {
        subscription.queue.put(WAKE);
      }
    }
  }

  protected abstract captureMessage(msg: TimedMidiMessage): void;

  /** Append and return a new open note for `msg`. */
  protected addNote(msg: NoteOnMessage & { time: Seconds }): NoteEvent {
    const note: NoteEvent = {
      pitch: msg.note,
      velocity: msg.velocity,
      startTime: msg.time,
      isDrum: msg.channel === DRUM_CHANNEL,
    };
    this.captured.notes.push(note);
    return note;
  }

  protected async run(): Promise<void> {
    let lastTime: Seconds | undefined;

    for (;;) {
      let timeout: Seconds | undefined;
      if (this.stopTime !== undefined) {
        timeout = this.stopTime - now();
        if (timeout <= 0) break;
      }

      const item = await this.receiveQueue.get(timeout);
      if (item === QUEUE_TIMEOUT || item === WAKE) continue;

      lastTime = item.time;
      if (item.time <= this._startTime) continue;

      if (this.stopSignal?.matches(item)) break;

      for (const subscription of this.iterSubscriptions) {
        if (subscription.signal.matches(item)) {
          subscription.queue.put(item);
        }
      }

      this.captureMessage(item);
    }

    const endTime = this.stopTime ?? lastTime ?? now();
    this.captured = clipSequence(this.captured, endTime);
    this.finalized = true;
    for (const subscription of this.iterSubscriptions) {
      subscription.queue.put(WAKE);
    }
  }

  /** True between start and the final sequence being stored. */
  private get capturing(): boolean {
    return this.isAlive() && !this.finalized;
  }

  private subscribe(signal: MidiSignal): IteratorSubscription {
    const subscription: IteratorSubscription = { signal, queue: new AsyncQueue() };
    this.iterSubscriptions.push(subscription);
    if (this.finalized) {
      subscription.queue.put(WAKE);
    }
    return subscription;
  }

  private async *iterateSignal(subscription: IteratorSubscription): AsyncGenerator<NoteSequence> {
    try {
      while (this.capturing) {
        const item = await subscription.queue.get();
        if (item === WAKE || item === QUEUE_TIMEOUT) {
          // Only sent once capture has ended; wait for the task to finish.
          await this.done;
          break;
        }
        if (!this.capturing) break;
        yield this.capturedSequence(item.time);
      }
      await this.done;
      yield this.capturedSequence();
    } finally {
      this.iterSubscriptions = this.iterSubscriptions.filter((s) => s !== subscription);
    }
  }

  private async *iteratePeriod(period: Seconds): AsyncGenerator<NoteSequence> {
    let nextYieldTime = now() + period;

    while (this.capturing) {
      const skippedPeriods = Math.floor((now() - nextYieldTime) / period);
      if (skippedPeriods > 0) {
        console.warn(
          `[MidiCaptor] Skipping ${skippedPeriods} ${period.toFixed(3)}s period(s) to catch up on iteration.`
        );
        nextYieldTime += skippedPeriods * period;
      } else {
        await sleepUntil(nextYieldTime, this.done);
      }
      const endTime = nextYieldTime;
      nextYieldTime += period;

      if (!this.capturing) break;
      yield this.capturedSequence(endTime);
    }
    await this.done;
    yield this.capturedSequence();
  }

  private async driveCallback(
    iterator: AsyncGenerator<NoteSequence>,
    fn: (sequence: NoteSequence) => void,
    handle: CallbackHandle
  ): Promise<void> {
    for await (const sequence of iterator) {
      if (handle.cancelled) break;
      try {
        fn(sequence);
      } catch (err) {
        console.error(`[MidiCaptor] Callback failed:`, err);
      }
    }
  }
}
