import { ConfigError } from "./errors"

export const DEFAULT_PORT = 8000
export const DEFAULT_MAX_WAIT_SECONDS = 30

export interface HandoffConfig {
  watchDir: string
  port: number
  host?: string
  maxWaitSeconds: number
  verbose: boolean
}

export interface RawArgs {
  dir: string
  port?: string
  maxWait?: string
  host?: string
  verbose?: boolean
}

function parseInteger(name: string, raw: string, min: number, max: number) {
  const trimmed = raw.trim()
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(`${name} must be a whole number, got "${raw}"`)
  }
  const value = Number.parseInt(trimmed, 10)
  if (value < min || value > max) {
    throw new ConfigError(`${name} must be between ${min} and ${max}, got ${value}`)
  }
  return value
}

// Flags win over the environment; PORT is honoured for hosts that assign the
// port through it.
export function resolveConfig(
  args: RawArgs,
  env: NodeJS.ProcessEnv = process.env,
): HandoffConfig {
  const watchDir = args.dir.trim()
  if (!watchDir) {
    throw new ConfigError("A directory to watch is required")
  }

  const rawPort = args.port || env.PORT
  const port =
    rawPort === undefined || rawPort === ""
      ? DEFAULT_PORT
      : parseInteger("port", rawPort, 0, 65535)

  const maxWaitSeconds =
    args.maxWait === undefined || args.maxWait === ""
      ? DEFAULT_MAX_WAIT_SECONDS
      : parseInteger("max-wait", args.maxWait, 0, 86_400)

  return {
    watchDir,
    port,
    host: args.host || undefined,
    maxWaitSeconds,
    verbose: args.verbose ?? false,
  }
}
