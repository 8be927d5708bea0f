import consola from "consola"
import type net from "node:net"
import invariant from "tiny-invariant"

import { createApp, createHttpServer } from "~/server"

import { ArtifactWatcher } from "./artifact-watcher"
import { ConnectionTracker } from "./connection-tracker"
import {
  bindListener,
  DrainingListener,
  type ServeResult,
} from "./draining-listener"
import { OneShotSignal } from "./one-shot-signal"
import {
  ExitCode,
  type HandoffOptions,
  type HandoffStatus,
  type LifecycleState,
  type ShutdownTrigger,
} from "./types"

type StopReason = ServeResult | { reason: "fatal"; error: Error }

const HANDLED_SIGNALS: ReadonlyArray<NodeJS.Signals> = ["SIGINT", "SIGTERM"]

function describeTrigger(trigger: ShutdownTrigger | undefined): string {
  if (!trigger) return "listener stopped"
  return trigger.kind === "artifact"
    ? `new artifact ${trigger.path}`
    : `signal ${trigger.signal}`
}

// Lifecycle owner for one process: serving -> draining -> terminated.
// - Starts the artifact watcher and the draining listener
// - Waits for the serving loop to stop, then drains with a hard deadline
// - Exits 0 when drained, 2 when forced, 1 on fatal watcher errors
export class HandoffController {
  private state: LifecycleState = "init"
  private hooks: Array<() => Promise<void> | void> = []
  private readonly tracker = new ConnectionTracker()
  private readonly trigger = new OneShotSignal<ShutdownTrigger>()
  private readonly fatal = new OneShotSignal<Error>()
  private readonly forced = new OneShotSignal<void>()
  private listener: DrainingListener | null = null
  private signalHandlers = new Map<NodeJS.Signals, () => void>()
  private readonly exitOnShutdown: boolean
  private readonly handleSignals: boolean

  constructor(private readonly opts: HandoffOptions) {
    this.exitOnShutdown = opts.exitOnShutdown ?? true
    this.handleSignals = opts.handleSignals ?? true
  }

  // Register a cleanup hook to run when draining begins. Hooks should be fast
  // and idempotent; failures are logged and never delay termination.
  registerHook(hook: () => Promise<void> | void) {
    this.hooks.push(hook)
  }

  getState(): LifecycleState {
    return this.state
  }

  status(): HandoffStatus {
    return { state: this.state, connections: this.tracker.size }
  }

  address(): net.AddressInfo | null {
    const address = this.listener?.address()
    return address && typeof address === "object" ? address : null
  }

  // Fires the same signal a new artifact would. Returns false when shutdown
  // was already requested.
  requestShutdown(trigger: ShutdownTrigger): boolean {
    return this.trigger.fire(trigger)
  }

  async start(): Promise<void> {
    if (this.state !== "init") {
      throw new Error(`Cannot start from state ${this.state}`)
    }
    this.state = "starting"

    consola.info(`Starting watcher on ${this.opts.watchDir}`)
    const watcher = new ArtifactWatcher({
      dir: this.opts.watchDir,
      signal: this.trigger,
      onError: (error) => this.fatal.fire(error),
    })

    try {
      await watcher.start()

      const createServer =
        this.opts.createServer
        ?? (() => createHttpServer(createApp(() => this.status())))
      const server = createServer()
      await bindListener(server, this.opts.port, this.opts.host)

      this.listener = new DrainingListener(server, this.tracker)
      this.listener.armCloseOnSignal(this.trigger)
    } catch (error) {
      this.state = "failed"
      watcher.stop()
      throw error
    }

    this.registerHook(() => {
      consola.info("Stopping watching")
      watcher.stop()
    })

    if (this.handleSignals) {
      this.installSignalHandlers()
    }

    this.state = "serving"
    const address = this.address()
    consola.info(
      `Serving on port ${address ? address.port : this.opts.port}`,
    )
  }

  // Blocks until the serving loop stops, drains, and terminates.
  async wait(): Promise<ExitCode> {
    const listener = this.listener
    invariant(
      listener && this.state === "serving",
      `Cannot wait from state ${this.state}`,
    )

    const stopped: StopReason = await Promise.race([
      listener.serve(),
      this.fatal
        .wait()
        .then((error): StopReason => ({ reason: "fatal", error })),
    ])

    if (stopped.reason === "fatal") {
      consola.error("Artifact watcher failed, terminating:", stopped.error)
      listener.close()
      await this.runHooks()
      return this.terminate(ExitCode.Fatal)
    }

    this.state = "draining"
    consola.info("Begin graceful shutdown:", describeTrigger(this.trigger.value))

    const hookRuns = this.runHooks()

    const seconds = this.opts.maxWaitMs / 1000
    consola.info(`Waiting for existing clients for up to ${seconds} seconds`, {
      active: this.tracker.size,
    })

    const outcome = await Promise.race([
      this.tracker.awaitDrained(this.opts.maxWaitMs),
      this.forced.wait().then(() => "timeout" as const),
    ])

    if (outcome === "timeout") {
      const severed = [...listener.connections].map((c) => c.remoteAddress)
      consola.warn(
        `Maximum wait time exceeded with ${severed.length} connection(s) open. Terminating.`,
      )
      if (severed.length > 0) {
        consola.warn(`Severing connections: ${severed.join(", ")}`)
      }
      return this.terminate(ExitCode.Forced)
    }

    await hookRuns
    consola.success("All connections closed. Shutting down.")
    return this.terminate(ExitCode.Drained)
  }

  async run(): Promise<ExitCode> {
    await this.start()
    return this.wait()
  }

  private async runHooks(): Promise<void> {
    const hooks = this.hooks
    this.hooks = []

    await Promise.allSettled(
      hooks.map(async (hook) => {
        try {
          await hook()
        } catch (err) {
          consola.warn("Shutdown hook failed:", err)
        }
      }),
    )
  }

  private installSignalHandlers() {
    for (const signal of HANDLED_SIGNALS) {
      const handler = () => this.handleSignal(signal)
      process.on(signal, handler)
      this.signalHandlers.set(signal, handler)
    }
  }

  private removeSignalHandlers() {
    for (const [signal, handler] of this.signalHandlers) {
      process.off(signal, handler)
    }
    this.signalHandlers.clear()
  }

  private handleSignal(signal: NodeJS.Signals) {
    consola.info("Signal received:", signal)
    if (this.state === "draining") {
      consola.warn(
        "Second signal received during shutdown: forcing immediate termination",
      )
      this.forced.fire()
      return
    }

    this.requestShutdown({ kind: "signal", signal })
  }

  private terminate(code: ExitCode): ExitCode {
    this.state = code === ExitCode.Fatal ? "failed" : "terminated"
    this.removeSignalHandlers()

    if (this.exitOnShutdown) {
      process.exit(code)
    }
    return code
  }
}
