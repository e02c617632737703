import { setImmediate as nextTurn } from "node:timers/promises"

/**
 * Coalesces concurrent flush requests: callers arriving while a flush is
 * waiting for its turn join it and share its result. Once the flush drains,
 * later callers start a new one, so a flush never misses writes made before
 * it was requested.
 */
export class FlushBarrier {
  private inflight: Promise<number> | undefined
  private joined = 0

  constructor(private readonly drain: () => number) {}

  run(): Promise<number> {
    if (this.inflight) {
      this.joined++
      return this.inflight
    }

    const flight = this.flushOnce()

    this.inflight = flight
    return flight
  }

  /** Callers sharing the outstanding flush, besides the one that started it. */
  get followers(): number {
    return this.joined
  }

  get inFlight(): boolean {
    return this.inflight !== undefined
  }

  private async flushOnce(): Promise<number> {
    await nextTurn()

    this.inflight = undefined
    this.joined = 0

    return this.drain()
  }
}
