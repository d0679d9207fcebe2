/**
 * Base for long-running components (captors, players, metronome, interaction).
 *
 * A task runs its loop once: `idle → running → stopped`. It cannot be
 * restarted; a stopped task is discarded and replaced.
 */

import { ProtocolStateError } from "../errors";
import { Deferred } from "./Deferred";

export type TaskState = "idle" | "running" | "stopped";

const counters: Map<string, number> = new Map();

function nextTaskName(kind: string): string {
  const n = (counters.get(kind) ?? 0) + 1;
  counters.set(kind, n);
  return `${kind}-${n}`;
}

export abstract class BackgroundTask {
  readonly name: string;

  private _state: TaskState = "idle";
  private finished = new Deferred();
  private failure: { error: unknown } | null = null;

  constructor(kind: string) {
    this.name = nextTaskName(kind);
  }

  get state(): TaskState {
    return this._state;
  }

  isAlive(): boolean {
    return this._state === "running";
  }

  start(): void {
    if (this._state !== "idle") {
      throw new ProtocolStateError(
        `${this.name} has already been started; tasks are not restartable.`
      );
    }
    this._state = "running";
    void this.run().then(
      () => this.finish(),
      (error: unknown) => {
        this.failure = { error };
        console.error(`[${this.name}] Task failed:`, error);
        this.finish();
      }
    );
  }

  /**
   * Resolves once the run loop has settled. Rejects with the loop's error
   * if it failed. Joining a task that never started resolves immediately.
   */
  async join(): Promise<void> {
    if (this._state === "idle") return;
    await this.finished.promise;
    if (this.failure) {
      throw this.failure.error;
    }
  }

  /** Settles when the run loop ends; never rejects. */
  protected get done(): Promise<void> {
    return this.finished.promise;
  }

  protected abstract run(): Promise<void>;

  private finish(): void {
    this._state = "stopped";
    this.finished.resolve();
  }
}
