// src/modules/scheduling/round-waiter.ts
import { createInterface } from "node:readline/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { minutesToMs } from "../../config/game-config";
import { WaitCancelledError } from "../../errors";

export const ROUND_WAITER = "ROUND_WAITER";
export const CLOCK = "CLOCK";

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** Blocking suspension between round stages. */
export interface RoundWaiter {
  wait(minutes: number, reason: string): Promise<void>;
  /** Rejects pending and later waits with a WaitCancelledError. */
  cancel?(): void;
}

export class TimerWaiter implements RoundWaiter {
  private readonly controller = new AbortController();

  async wait(minutes: number, reason: string): Promise<void> {
    try {
      await sleep(minutesToMs(minutes), undefined, { signal: this.controller.signal });
    } catch (error) {
      if (this.controller.signal.aborted) throw new WaitCancelledError(reason);
      throw error;
    }
  }

  cancel(): void {
    this.controller.abort();
  }
}

/**
 * Replaces the wall-clock wait with an operator keypress. Downstream
 * behaviour is the same as after a real wait.
 */
export class ManualAdvanceWaiter implements RoundWaiter {
  private readonly controller = new AbortController();

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async wait(minutes: number, reason: string): Promise<void> {
    if (this.controller.signal.aborted) throw new WaitCancelledError(reason);
    const rl = createInterface({ input: this.input, output: this.output });
    try {
      await rl.question(`Press ENTER to skip ${minutes} minutes (${reason}): `, {
        signal: this.controller.signal,
      });
    } catch (error) {
      if (this.controller.signal.aborted) throw new WaitCancelledError(reason);
      throw error;
    } finally {
      rl.close();
    }
  }

  cancel(): void {
    this.controller.abort();
  }
}
