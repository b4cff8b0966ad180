import { describe, expect, it } from "vitest";
import { SessionClock } from "../src/session-clock.js";

describe("SessionClock", () => {
  it("returns zero relative times for the first packet", () => {
    const clock = new SessionClock();

    expect(clock.sync(1000.25, 12.5)).toEqual({
      timeProtocol: 1000.25,
      timeLocal: 12.5,
      relTimeProtocol: 0,
      relTimeLocal: 0,
    });
    expect(clock.initialised).toBe(true);
  });

  it("measures later packets against the first one", () => {
    const clock = new SessionClock();
    clock.sync(1000, 10);

    expect(clock.sync(1001.5, 12)).toEqual({
      timeProtocol: 1001.5,
      timeLocal: 12,
      relTimeProtocol: 1.5,
      relTimeLocal: 2,
    });
  });

  it("passes out-of-order protocol times through unchanged", () => {
    const clock = new SessionClock();
    clock.sync(1000, 10);

    expect(clock.sync(999, 11).relTimeProtocol).toBe(-1);
  });

  it("takes the protocol origin from the first finite protocol time", () => {
    const clock = new SessionClock();

    expect(clock.sync(Number.NaN, 10).relTimeProtocol).toBeNaN();
    expect(clock.sync(500, 11).relTimeProtocol).toBe(0);
    expect(clock.sync(502, 12)).toMatchObject({ relTimeProtocol: 2, relTimeLocal: 2 });
  });

  it("stamps messages on the local channel only", () => {
    const clock = new SessionClock();

    const early = clock.syncLocal(5);
    expect(early.timeLocal).toBe(5);
    expect(early.relTimeLocal).toBeNaN();
    expect(clock.initialised).toBe(false);

    clock.sync(1000, 10);
    const late = clock.syncLocal(13);
    expect(late.relTimeLocal).toBe(3);
    expect(late.timeProtocol).toBeNaN();
    expect(late.relTimeProtocol).toBeNaN();
  });

  it("starts over after reset", () => {
    const clock = new SessionClock();
    clock.sync(1000, 10);
    clock.reset();

    expect(clock.initialised).toBe(false);
    expect(clock.sync(2000, 20).relTimeLocal).toBe(0);
  });
});
