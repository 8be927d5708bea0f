import { defineCommand } from "citty"
import consola from "consola"

import { HandoffController } from "./daemon/controller"
import { ExitCode } from "./daemon/types"
import { type HandoffConfig, resolveConfig } from "./lib/config"

export async function runServer(config: HandoffConfig): Promise<void> {
  if (config.verbose) {
    consola.level = 5
    consola.info("Verbose logging enabled")
  }

  consola.info("Configuration:", {
    watchDir: config.watchDir,
    port: config.port,
    host: config.host ?? "(all interfaces)",
    maxWaitSeconds: config.maxWaitSeconds,
  })

  const controller = new HandoffController({
    port: config.port,
    host: config.host,
    watchDir: config.watchDir,
    maxWaitMs: config.maxWaitSeconds * 1000,
  })

  try {
    await controller.start()
  } catch (error) {
    consola.error("Failed to start server:", error)
    // Non-zero exit so the supervisor sees the failed start
    process.exit(ExitCode.Fatal)
  }

  await controller.wait()
}

export const start = defineCommand({
  meta: {
    name: "hot-handoff",
    description:
      "Serve HTTP until a new build lands in the watched directory, then drain and exit",
  },
  args: {
    dir: {
      type: "positional",
      required: true,
      description: "Directory watched for new build artifacts",
    },
    port: {
      alias: "p",
      type: "string",
      description: "HTTP port (default: $PORT or 8000)",
    },
    "max-wait": {
      alias: "w",
      type: "string",
      default: "30",
      description: "Max seconds to wait for clients before forcible termination",
    },
    host: {
      type: "string",
      description: "Address to bind (default: all interfaces)",
    },
    verbose: {
      alias: "v",
      type: "boolean",
      default: false,
      description: "Enable verbose logging",
    },
  },
  run({ args }) {
    return runServer(
      resolveConfig({
        dir: args.dir,
        port: args.port,
        maxWait: args["max-wait"],
        host: args.host,
        verbose: args.verbose,
      }),
    )
  },
})
