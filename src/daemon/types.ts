import type net from "node:net"

export type LifecycleState =
  | "init"
  | "starting"
  | "serving"
  | "draining"
  | "terminated"
  | "failed"

export type DrainOutcome = "drained" | "timeout"

export type ShutdownTrigger =
  | { kind: "artifact"; path: string }
  | { kind: "signal"; signal: NodeJS.Signals }

// Exit statuses observed by the supervisor
export const ExitCode = {
  Drained: 0,
  Fatal: 1,
  Forced: 2,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

export interface HandoffStatus {
  state: LifecycleState
  connections: number
}

export interface HandoffOptions {
  port: number
  host?: string
  watchDir: string
  // Grace period for in-flight connections once the listener is closed
  maxWaitMs: number
  // When false, the controller does not call process.exit at the end of
  // shutdown. Tests set this to keep the runner alive.
  exitOnShutdown?: boolean
  // Install SIGINT/SIGTERM handlers. Tests disable this.
  handleSignals?: boolean
  // Factory for the underlying listener; defaults to the HTTP server
  createServer?: () => net.Server
}
