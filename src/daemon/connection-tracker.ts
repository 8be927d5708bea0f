import invariant from "tiny-invariant"

import type { DrainOutcome } from "./types"

// Counts connections accepted by the listener and lets the shutdown path wait
// for the count to reach zero. One instance is created at startup and passed
// to every component that needs it.
export class ConnectionTracker {
  private active = 0
  private waiters = new Set<() => void>()

  get size(): number {
    return this.active
  }

  onAccept(): void {
    this.active += 1
  }

  onClose(): void {
    invariant(this.active > 0, "Connection closed more times than accepted")
    this.active -= 1

    if (this.active === 0) {
      const waiters = [...this.waiters]
      this.waiters.clear()
      for (const wake of waiters) wake()
    }
  }

  // Resolves "drained" once every tracked connection has closed, or "timeout"
  // when deadlineMs elapses first.
  awaitDrained(deadlineMs: number): Promise<DrainOutcome> {
    if (this.active === 0) return Promise.resolve("drained")

    return new Promise((resolve) => {
      const wake = () => {
        clearTimeout(timer)
        resolve("drained")
      }

      const timer = setTimeout(
        () => {
          this.waiters.delete(wake)
          resolve("timeout")
        },
        Math.max(0, deadlineMs),
      )

      this.waiters.add(wake)
    })
  }
}
