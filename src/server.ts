import { Hono } from "hono"
import { logger } from "hono/logger"
import http from "node:http"
import type net from "node:net"
import { serve } from "srvx"
import invariant from "tiny-invariant"

import type { HandoffStatus } from "~/daemon/types"

// Client-facing contract of the HTTP server
export const READ_TIMEOUT_MS = 15_000
export const WRITE_TIMEOUT_MS = 15_000
export const MAX_HEADER_BYTES = 1 << 20

export function createApp(status: () => HandoffStatus): Hono {
  const app = new Hono()

  app.use(logger())

  // Ask keep-alive clients to go away once their current request is done so
  // the drain does not depend on idle sockets timing out.
  app.use(async (c, next) => {
    await next()
    if (status().state === "draining") {
      c.header("Connection", "close")
    }
  })

  app.get("/", (c) => c.json({ message: "Hello from hot-handoff!" }))

  app.get("/healthz", (c) => c.json(status()))

  return app
}

// Builds the Node.js HTTP server without binding it; the controller owns
// listen and close.
export function createHttpServer(app: Hono): net.Server {
  const handle = serve({
    fetch: (request) => app.fetch(request),
    manual: true,
    node: {
      maxHeaderSize: MAX_HEADER_BYTES,
      requestTimeout: READ_TIMEOUT_MS,
      headersTimeout: READ_TIMEOUT_MS,
    },
  })

  const server = handle.node?.server
  invariant(server, "srvx did not create a Node.js server")

  if (server instanceof http.Server) {
    server.setTimeout(WRITE_TIMEOUT_MS)
  }
  return server
}
