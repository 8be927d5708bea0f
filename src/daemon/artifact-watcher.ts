import consola from "consola"
import fs from "node:fs"
import fsp from "node:fs/promises"
import path from "node:path"
import invariant from "tiny-invariant"

import { errorMessage, StartupError } from "~/lib/errors"

import type { OneShotSignal } from "./one-shot-signal"
import type { ShutdownTrigger } from "./types"

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

export type WatcherState = "idle" | "watching" | "fired" | "stopped"

export interface ArtifactWatcherOptions {
  dir: string
  signal: OneShotSignal<ShutdownTrigger>
  // Runtime failures of the notification mechanism; the caller treats them
  // as fatal since the server would otherwise never learn about new builds.
  onError: (error: Error) => void
}

// Watches a single directory and fires the shutdown signal on the first file
// created in it. Any name qualifies.
export class ArtifactWatcher {
  private state: WatcherState = "idle"
  private watcher: fs.FSWatcher | null = null

  constructor(private readonly opts: ArtifactWatcherOptions) {}

  getState(): WatcherState {
    return this.state
  }

  async start(): Promise<void> {
    invariant(this.state === "idle", `Cannot start watcher from state ${this.state}`)
    const { dir } = this.opts

    let watcher: fs.FSWatcher
    try {
      const stats = await fsp.stat(dir)
      if (!stats.isDirectory()) {
        throw new Error("not a directory")
      }
      watcher = fs.watch(dir, { persistent: true }, (eventType, filename) =>
        this.handleEvent(eventType, filename),
      )
    } catch (err) {
      this.state = "stopped"
      throw new StartupError(
        "watch",
        `Could not create watcher for ${dir}: ${errorMessage(err)}`,
        { cause: err },
      )
    }

    watcher.on("error", (err) => this.handleError(err))
    this.watcher = watcher
    this.state = "watching"
    consola.debug(`Watching ${dir} for new build artifacts`)
  }

  // Releases the OS watcher. Safe to call in any state.
  stop(): void {
    if (this.state === "watching" || this.state === "idle") {
      this.state = "stopped"
    }
    this.closeWatcher()
  }

  private handleEvent(eventType: fs.WatchEventType, filename: string | null) {
    if (this.state !== "watching") return
    // Creations and deletions both surface as "rename"
    if (eventType !== "rename" || !filename) return

    void this.classify(path.join(this.opts.dir, filename))
  }

  private async classify(entry: string) {
    // lstat: a symlink to a target that does not exist yet is still a new entry
    try {
      await fsp.lstat(entry)
    } catch (err) {
      if (isNotFound(err)) {
        consola.debug(`Ignoring ${entry}, no longer present`)
        return
      }
      // Present but unreadable (EACCES, ELOOP): still a creation
      consola.debug(`Could not inspect ${entry}: ${errorMessage(err)}`)
    }

    if (this.state !== "watching") return
    this.state = "fired"
    this.closeWatcher()

    consola.info(`New build artifact found: ${entry}. Preparing to shut down.`)
    this.opts.signal.fire({ kind: "artifact", path: entry })
  }

  private handleError(err: Error) {
    consola.error("File watcher error occurred:", err)
    this.state = "stopped"
    this.closeWatcher()
    this.opts.onError(err)
  }

  private closeWatcher() {
    this.watcher?.close()
    this.watcher = null
  }
}
