import consola from "consola"
import type net from "node:net"

import { StartupError } from "~/lib/errors"

import type { ConnectionTracker } from "./connection-tracker"
import { OneShotSignal } from "./one-shot-signal"

export type ServeResult =
  | { reason: "closed" }
  | { reason: "error"; error: Error }

// Binds the listener the DrainingListener will own. Bind failures are fatal
// startup errors.
export function bindListener(
  server: net.Server,
  port: number,
  host?: string,
): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      server.off("listening", onListening)
      reject(
        new StartupError(
          "listen",
          `Could not create listener on port ${port}: ${error.message}`,
          { cause: error },
        ),
      )
    }
    const onListening = () => {
      server.off("error", onError)
      resolve()
    }

    server.once("error", onError)
    server.once("listening", onListening)
    server.listen({ port, host })
  })
}

function describeRemote(socket: net.Socket): string {
  if (!socket.remoteAddress) return "unknown"
  return socket.remoteFamily === "IPv6"
    ? `[${socket.remoteAddress}]:${socket.remotePort}`
    : `${socket.remoteAddress}:${socket.remotePort}`
}

/**
 * One accepted connection. Reads and writes go straight to the socket; only
 * closing is intercepted so the tracker slot is released exactly once, whether
 * the socket closes on its own or through `close()`.
 */
export class TrackedConnection {
  // Captured at accept time, the socket forgets it once destroyed
  readonly remoteAddress: string
  private released = false

  constructor(
    readonly socket: net.Socket,
    private readonly onRelease: (connection: TrackedConnection) => void,
  ) {
    this.remoteAddress = describeRemote(socket)
    socket.once("close", () => this.release())
  }

  get closed(): boolean {
    return this.released
  }

  close(): void {
    try {
      this.socket.destroy()
    } catch (err) {
      consola.debug(`Error closing connection to ${this.remoteAddress}:`, err)
    } finally {
      this.release()
    }
  }

  private release() {
    if (this.released) return
    this.released = true
    consola.debug(`Connection to ${this.remoteAddress} closed`)
    this.onRelease(this)
  }
}

/**
 * Wraps a bound listener so new-connection intake can be stopped on demand
 * while already accepted connections keep being served.
 *
 * Every `connection` event is an accept: the socket is wrapped in a
 * {@link TrackedConnection} and counted by the tracker. After `close()` the
 * OS refuses new connections and nothing else is tracked.
 */
export class DrainingListener {
  readonly connections = new Set<TrackedConnection>()
  private closed = false
  private readonly stopped = new OneShotSignal<ServeResult>()

  constructor(
    private readonly listener: net.Server,
    private readonly tracker: ConnectionTracker,
  ) {
    listener.on("connection", (socket: net.Socket) => this.accept(socket))
    listener.on("error", (error: Error) => {
      consola.error("Listener error, no longer accepting connections:", error)
      this.stop({ reason: "error", error })
    })
  }

  get isClosed(): boolean {
    return this.closed
  }

  address(): net.AddressInfo | string | null {
    return this.listener.address()
  }

  // Resolves once the listener stops accepting, which is the drain trigger
  serve(): Promise<ServeResult> {
    return this.stopped.wait()
  }

  armCloseOnSignal<T>(signal: OneShotSignal<T>): void {
    signal.onFire(() => {
      consola.info("Stopping listening for new connections")
      this.close()
    })
  }

  close(): void {
    this.stop({ reason: "closed" })
  }

  private stop(result: ServeResult) {
    if (this.closed) return
    this.closed = true

    // The callback only reports once every connection is gone, or that the
    // listener was not running, which is fine here.
    this.listener.close((err) => {
      if (err) consola.debug("Listener was already closed:", err.message)
    })
    this.stopped.fire(result)
  }

  private accept(socket: net.Socket) {
    if (this.closed) {
      socket.destroy()
      return
    }

    const connection = new TrackedConnection(socket, (released) => {
      this.connections.delete(released)
      this.tracker.onClose()
    })
    this.connections.add(connection)
    this.tracker.onAccept()
    consola.debug(`New connection from ${connection.remoteAddress}`)
  }
}
