import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Effect, Queue } from "effect";
import { createTimerScheduler } from "../../src";

describe("timer scheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const setup = () => {
    const alarms = Effect.runSync(Queue.unbounded<string>());
    const scheduler = createTimerScheduler(alarms);
    const pending = () => Effect.runSync(Queue.size(alarms));
    return { alarms, scheduler, pending };
  };

  it("offers the id once the time is reached", () => {
    const { alarms, scheduler, pending } = setup();
    Effect.runSync(scheduler.schedule("exec-1", 1_000));

    vi.advanceTimersByTime(999);
    expect(pending()).toBe(0);

    vi.advanceTimersByTime(1);
    expect(pending()).toBe(1);
    expect(Effect.runSync(Queue.take(alarms))).toBe("exec-1");
    expect(scheduler.size()).toBe(0);
  });

  it("replaces an earlier alarm for the same id", () => {
    const { scheduler, pending } = setup();
    Effect.runSync(scheduler.schedule("exec-1", 1_000));
    Effect.runSync(scheduler.schedule("exec-1", 5_000));
    expect(Effect.runSync(scheduler.getScheduled("exec-1"))).toBe(5_000);

    vi.advanceTimersByTime(1_000);
    expect(pending()).toBe(0);
    vi.advanceTimersByTime(4_000);
    expect(pending()).toBe(1);
  });

  it("does not fire cancelled alarms", () => {
    const { scheduler, pending } = setup();
    Effect.runSync(scheduler.schedule("exec-1", 1_000));
    Effect.runSync(scheduler.cancel("exec-1"));

    vi.advanceTimersByTime(2_000);
    expect(pending()).toBe(0);
    expect(Effect.runSync(scheduler.getScheduled("exec-1"))).toBeUndefined();
  });

  it("fires past-due alarms on the next tick", () => {
    const { scheduler, pending } = setup();
    vi.setSystemTime(10_000);
    Effect.runSync(scheduler.schedule("late", 1_000));

    vi.advanceTimersByTime(0);
    expect(pending()).toBe(1);
  });
});
