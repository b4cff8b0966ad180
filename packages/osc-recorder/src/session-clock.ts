import { performance } from "node:perf_hooks";
import { MISSING } from "./schema.js";
import type { SyncedTimes } from "./types.js";

/** Local wall clock in seconds, monotonic. */
export function localNowSeconds(): number {
  return performance.now() / 1000;
}

export class SessionClock {
  private t0Protocol: number | undefined;
  private t0Local: number | undefined;

  get initialised(): boolean {
    return this.t0Local !== undefined;
  }

  sync(timeProtocol: number, timeLocal: number): SyncedTimes {
    if (this.t0Local === undefined) {
      this.t0Local = timeLocal;
    }
    if (this.t0Protocol === undefined && Number.isFinite(timeProtocol)) {
      this.t0Protocol = timeProtocol;
    }

    return {
      timeProtocol,
      timeLocal,
      relTimeProtocol: this.t0Protocol === undefined ? MISSING : timeProtocol - this.t0Protocol,
      relTimeLocal: timeLocal - this.t0Local,
    };
  }

  // Message rows carry no protocol time and never start the clock.
  syncLocal(timeLocal: number): SyncedTimes {
    return {
      timeProtocol: MISSING,
      timeLocal,
      relTimeProtocol: MISSING,
      relTimeLocal: this.t0Local === undefined ? MISSING : timeLocal - this.t0Local,
    };
  }

  reset(): void {
    this.t0Protocol = undefined;
    this.t0Local = undefined;
  }
}
