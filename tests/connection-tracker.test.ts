import { afterEach, expect, test, vi } from "vitest"

import { ConnectionTracker } from "../src/daemon/connection-tracker"

afterEach(() => {
  vi.useRealTimers()
})

test("awaitDrained reports drained once every accepted connection closed", async () => {
  const tracker = new ConnectionTracker()
  for (let i = 0; i < 5; i++) tracker.onAccept()
  expect(tracker.size).toBe(5)

  const drained = tracker.awaitDrained(5000)
  for (let i = 0; i < 5; i++) tracker.onClose()

  expect(tracker.size).toBe(0)
  await expect(drained).resolves.toBe("drained")
})

test("awaitDrained returns immediately when nothing is open", async () => {
  vi.useFakeTimers()
  const tracker = new ConnectionTracker()

  // No timer may be scheduled, otherwise the result would depend on the clock
  await expect(tracker.awaitDrained(60_000)).resolves.toBe("drained")
  expect(vi.getTimerCount()).toBe(0)
})

test("awaitDrained times out at the deadline, not before", async () => {
  vi.useFakeTimers()
  const tracker = new ConnectionTracker()
  tracker.onAccept()

  const pending = tracker.awaitDrained(1000)
  const settled = vi.fn()
  void pending.then(settled)

  await vi.advanceTimersByTimeAsync(999)
  expect(settled).not.toHaveBeenCalled()

  await vi.advanceTimersByTimeAsync(1)
  await expect(pending).resolves.toBe("timeout")
  expect(tracker.size).toBe(1)
})

test("draining clears the deadline timer and releases every waiter", async () => {
  vi.useFakeTimers()
  const tracker = new ConnectionTracker()
  tracker.onAccept()
  tracker.onAccept()

  const first = tracker.awaitDrained(1000)
  const second = tracker.awaitDrained(2000)
  expect(vi.getTimerCount()).toBe(2)

  tracker.onClose()
  tracker.onClose()

  await expect(first).resolves.toBe("drained")
  await expect(second).resolves.toBe("drained")
  expect(vi.getTimerCount()).toBe(0)
})

test("closing more connections than were accepted fails", () => {
  const tracker = new ConnectionTracker()
  tracker.onAccept()
  tracker.onClose()

  expect(() => tracker.onClose()).toThrow()
  expect(tracker.size).toBe(0)
})
