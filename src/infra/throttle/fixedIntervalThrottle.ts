import type { ClockPort, SleeperPort } from "../../core/ports/outboundPorts";

/**
 * Spaces outbound requests by a fixed minimum interval. Not adaptive to server load or errors.
 */
export class FixedIntervalThrottle {
  private lastIssuedAt: number | null = null;

  constructor(
    private readonly intervalMs: number,
    private readonly clock: ClockPort,
    private readonly sleeper: SleeperPort,
  ) {}

  /**
   * Waits until the interval has elapsed since the last issued request, or the full
   * interval when nothing has been issued yet. Returns the number of milliseconds waited.
   */
  async acquire(): Promise<number> {
    if (this.lastIssuedAt === null) {
      await this.sleeper.sleep(this.intervalMs);
      return this.intervalMs;
    }

    const elapsed = this.clock.now().getTime() - this.lastIssuedAt;
    const remaining = this.intervalMs - elapsed;
    if (remaining <= 0) {
      return 0;
    }

    await this.sleeper.sleep(remaining);
    return remaining;
  }

  markIssued(): void {
    this.lastIssuedAt = this.clock.now().getTime();
  }
}
