export type StartupPhase = "listen" | "watch"

// Raised before the server starts serving; always fatal
export class StartupError extends Error {
  readonly phase: StartupPhase

  constructor(phase: StartupPhase, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = "StartupError"
    this.phase = phase
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ConfigError"
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
