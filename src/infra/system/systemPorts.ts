import type { ClockPort, SleeperPort } from "../../core/ports/outboundPorts";

/**
 * Adapts wall-clock access so time-sensitive logic remains deterministic in tests.
 */
export class SystemClock implements ClockPort {
  /**
   * Provides a single clock boundary for throttling and the rolling selection window.
   */
  now(): Date {
    return new Date();
  }
}

/**
 * Wraps timer-based waiting so request pacing can be faked in tests.
 */
export class TimerSleeper implements SleeperPort {
  async sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }

    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
