import { describe, expect, it } from "vitest";
import { ManualClock, Throttle } from "./throttle.js";

describe("Throttle", () => {
  it("lets the first call through immediately", async () => {
    const clock = new ManualClock(5000);
    await new Throttle(1000, clock).wait();
    expect(clock.sleeps).toEqual([]);
  });

  it("waits out the rest of the interval", async () => {
    const clock = new ManualClock();
    const throttle = new Throttle(1000, clock);

    await throttle.wait();
    clock.advance(300);
    await throttle.wait();

    expect(clock.sleeps).toEqual([700]);
    expect(clock.now()).toBe(1000);
  });

  it("does not wait when the interval has already passed", async () => {
    const clock = new ManualClock();
    const throttle = new Throttle(1000, clock);

    await throttle.wait();
    clock.advance(2500);
    await throttle.wait();

    expect(clock.sleeps).toEqual([]);
  });

  it("spaces scheduled calls", async () => {
    const clock = new ManualClock();
    const throttle = new Throttle(1000, clock);
    const starts: number[] = [];

    for (let i = 0; i < 3; i++) {
      await throttle.schedule(async () => starts.push(clock.now()));
    }

    expect(starts).toEqual([0, 1000, 2000]);
  });
});
