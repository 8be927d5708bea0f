import fs from "node:fs/promises"
import net from "node:net"
import os from "node:os"
import path from "node:path"

import { bindListener } from "../src/daemon/draining-listener"

export async function listenOnLoopback(server: net.Server): Promise<number> {
  await bindListener(server, 0, "127.0.0.1")
  const address = server.address()
  if (!address || typeof address === "string") {
    throw new Error("expected a TCP address")
  }
  return address.port
}

// Opens a raw TCP client. Resets from the server side are expected in these
// tests, so socket errors after connecting are ignored.
export function connect(port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ port, host: "127.0.0.1" })
    socket.once("error", reject)
    socket.once("connect", () => {
      socket.off("error", reject)
      socket.on("error", () => {})
      resolve(socket)
    })
  })
}

export function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "hot-handoff-"))
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
