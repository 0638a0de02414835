/**
 * Restartable one-shot timer. Each record() cancels whatever was pending,
 * so only the most recent call ever fires.
 */

export class DelayTimer {
  private handle: ReturnType<typeof setTimeout> | null = null

  constructor(
    private delayMs: number,
    private readonly onFire: () => void
  ) {}

  get pending(): boolean {
    return this.handle !== null
  }

  get delay(): number {
    return this.delayMs
  }

  /**
   * Change the delay; a non-positive delay disables the timer
   */
  setDelay(delayMs: number): void {
    this.delayMs = delayMs
    if (delayMs <= 0) this.cancel()
  }

  record(): void {
    this.cancel()
    if (this.delayMs <= 0) return
    this.handle = setTimeout(() => {
      this.handle = null
      this.onFire()
    }, this.delayMs)
  }

  cancel(): void {
    if (this.handle !== null) {
      clearTimeout(this.handle)
      this.handle = null
    }
  }
}
