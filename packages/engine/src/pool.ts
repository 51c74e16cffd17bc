/**
 * A fixed number of worker slots shared by every target of a run.
 */
export class WorkerPool {
  private active = 0
  private readonly waiting: Array<() => void> = []

  constructor(readonly slots: number) {
    if (!Number.isInteger(slots) || slots < 1) {
      throw new RangeError(`Worker pool needs at least one slot, got ${slots}`)
    }
  }

  /** Tasks currently holding a slot */
  get running(): number {
    return this.active
  }

  /**
   * Run `task` once a slot is free. Slots are handed out first come, first served.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await task()
    } finally {
      this.release()
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.slots) {
      this.active++
      return Promise.resolve()
    }
    return new Promise((resolve) => {
      this.waiting.push(() => {
        this.active++
        resolve()
      })
    })
  }

  private release(): void {
    this.active--
    this.waiting.shift()?.()
  }
}
