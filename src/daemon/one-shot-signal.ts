import consola from "consola"

export type Unsubscribe = () => void

type SignalState<T> = { status: "pending" } | { status: "fired"; value: T }

/**
 * Single-writer, multi-reader event that fires at most once.
 *
 * Every listener and every waiter observes the value of the first `fire()`
 * call; later calls are ignored.
 */
export class OneShotSignal<T> {
  private state: SignalState<T> = { status: "pending" }
  private listeners = new Set<(value: T) => void>()

  get fired(): boolean {
    return this.state.status === "fired"
  }

  get value(): T | undefined {
    return this.state.status === "fired" ? this.state.value : undefined
  }

  /** Returns true only for the call that moved the signal to fired. */
  fire(value: T): boolean {
    if (this.state.status === "fired") return false
    this.state = { status: "fired", value }

    const listeners = [...this.listeners]
    this.listeners.clear()
    for (const listener of listeners) {
      notify(listener, value)
    }
    return true
  }

  onFire(listener: (value: T) => void): Unsubscribe {
    if (this.state.status === "fired") {
      notify(listener, this.state.value)
      return () => {}
    }

    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  wait(): Promise<T> {
    return new Promise((resolve) => {
      this.onFire(resolve)
    })
  }
}

function notify<T>(listener: (value: T) => void, value: T) {
  try {
    listener(value)
  } catch (err) {
    consola.warn("Shutdown signal listener failed:", err)
  }
}
