// packages/core/src/adapters/node/scheduler.ts

import { Effect, Queue } from "effect";
import type { SchedulerAdapterService } from "../scheduler";

// setTimeout overflows above a signed 32-bit delay
const MAX_TIMEOUT_MS = 2_147_483_647;

interface ArmedTimer {
  readonly time: number;
  readonly handle: ReturnType<typeof setTimeout>;
}

/**
 * Create a timer-backed scheduler for Node.
 *
 * Each fired timer offers its id to `alarms`; a consumer fiber re-enters the
 * executor from there. Timers live in process memory only, so durable
 * executions must be re-armed by recovery after a restart.
 */
export function createTimerScheduler(
  alarms: Queue.Enqueue<string>,
  options?: { readonly now?: () => number },
): SchedulerAdapterService & { readonly size: () => number } {
  const now = options?.now ?? (() => Date.now());
  const timers = new Map<string, ArmedTimer>();

  const clear = (id: string) => {
    const existing = timers.get(id);
    if (existing) {
      clearTimeout(existing.handle);
      timers.delete(id);
    }
  };

  const arm = (id: string, time: number) => {
    const delay = Math.max(0, time - now());
    const handle = setTimeout(
      () => {
        if (time - now() > 0) {
          // Long delay was clamped; keep waiting
          arm(id, time);
          return;
        }
        timers.delete(id);
        Queue.unsafeOffer(alarms, id);
      },
      Math.min(delay, MAX_TIMEOUT_MS),
    );
    timers.set(id, { time, handle });
  };

  return {
    schedule: (id, time) =>
      Effect.sync(() => {
        clear(id);
        arm(id, time);
      }),

    cancel: (id) => Effect.sync(() => clear(id)),

    getScheduled: (id) => Effect.sync(() => timers.get(id)?.time),

    size: () => timers.size,
  };
}
