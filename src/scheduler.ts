const MIN_POLL_SECONDS = 10

export type PollSchedulerOptions = {
  pollOnSeconds: number
  pollOffSeconds: number
  tickSizeSeconds: number
}

/**
 * Adaptive poll timing: time accumulates across heartbeat ticks and a poll fires
 * once it reaches the on-interval (something running) or the off-interval (all idle).
 */
export class PollScheduler {
  readonly pollOnSeconds: number
  readonly pollOffSeconds: number
  readonly tickSizeSeconds: number
  private accumulated = 0

  constructor(options: PollSchedulerOptions) {
    this.pollOnSeconds = Math.max(MIN_POLL_SECONDS, options.pollOnSeconds)
    this.pollOffSeconds = Math.max(MIN_POLL_SECONDS, options.pollOffSeconds)
    this.tickSizeSeconds = options.tickSizeSeconds
  }

  get accumulatedSeconds(): number {
    return this.accumulated
  }

  intervalFor(isOn: boolean): number {
    return isOn ? this.pollOnSeconds : this.pollOffSeconds
  }

  /**
   * Account for one tick. Returns true when a poll cycle is due, in which case
   * the accumulator has already been reset.
   */
  advance(isOn: boolean): boolean {
    this.accumulated += this.tickSizeSeconds
    if (this.accumulated < this.intervalFor(isOn)) {
      return false
    }
    this.accumulated = 0
    return true
  }

  reset(): void {
    this.accumulated = 0
  }
}
