import consola from "consola"

import { listenGraceful } from "~/listener"
import { EchoServer } from "~/server"

import type { DaemonOptions, LifecycleState, ServerHandle } from "./types"

export type StartFn = (opts: DaemonOptions) => Promise<ServerHandle>

// Default start: a keep-alive TCP listener wrapped for graceful close,
// served by the echo server
export async function startEchoServer(
  opts: DaemonOptions,
): Promise<ServerHandle> {
  const listener = await listenGraceful({
    port: opts.port,
    host: opts.host,
    keepAlivePeriodMs: opts.keepAlivePeriodMs,
  })
  return new EchoServer(listener)
}

// Lifecycle owner for a running server.
// - Owns the lifecycle state machine
// - Installs signal handlers (single owner)
// - Closes the listener, drains connections and enforces the deadline
// - Allows registration of cleanup hooks

export class DaemonController {
  private state: LifecycleState = "init"
  private readonly shutdownTimeoutMs: number
  private readonly pollIntervalMs: number
  // When false, do not call process.exit() after shutdown (useful for tests)
  private readonly exitOnShutdown: boolean
  private hooks: Array<() => Promise<void> | void> = []
  private forced = false
  private exitCode: number | null = null
  private server: ServerHandle | null = null
  private serving: Promise<void> | null = null

  constructor(
    private readonly opts: DaemonOptions,
    private readonly startFn: StartFn = startEchoServer,
  ) {
    this.shutdownTimeoutMs = opts.shutdownTimeoutMs ?? 30000
    this.pollIntervalMs = opts.pollIntervalMs ?? 200
    this.exitOnShutdown = opts.exitOnShutdown ?? true

    if (opts.installSignalHandlers ?? true) {
      this.installSignalHandlers()
    }
  }

  // Register a cleanup hook to be called during shutdown
  // Hooks should be idempotent and fast; they can return a Promise
  registerHook(hook: () => Promise<void> | void) {
    this.hooks.push(hook)
  }

  getState() {
    return this.state
  }

  getExitCode() {
    return this.exitCode
  }

  async start(): Promise<void> {
    if (this.state !== "init") {
      throw new Error(`Cannot start from state ${this.state}`)
    }

    this.state = "starting"
    consola.info("Daemon starting...")

    let server: ServerHandle
    try {
      server = await this.startFn(this.opts)
    } catch (error) {
      this.state = "failed"
      consola.error("Failed to start daemon:", error)
      throw error
    }

    this.server = server
    this.state = "ready"
    this.serving = server.serve().catch((err: unknown) => {
      consola.error("Accept loop failed, initiating shutdown:", err)
      void this.beginShutdown("accept-failure")
    })
    consola.info("Daemon ready and listening on", server.address())
  }

  // Begin the graceful shutdown sequence
  async beginShutdown(reason: string): Promise<void> {
    if (this.state === "stopped" || this.state === "draining") return
    this.state = "draining"

    consola.info("Begin graceful shutdown:", reason)
    const deadline = Date.now() + this.shutdownTimeoutMs
    const server = this.server
    let listenerClosed = false

    if (server) {
      // Stop admitting connections; the accept loop sees the shutdown
      // classification and exits on its own
      try {
        await server.close()
        listenerClosed = true
      } catch (err) {
        consola.warn("Failed to close listener:", err)
      }

      try {
        const closed = await server.closeIdle()
        consola.debug(`Closed ${closed} idle connection(s)`)
      } catch (err) {
        consola.warn("Failed to close idle connections:", err)
      }
    }

    const hookPromises = this.hooks.map(async (h) => {
      try {
        await h()
      } catch (err) {
        consola.warn("Shutdown hook failed:", err)
      }
    })

    // Connections finish their current exchange and close; poll until none
    // are left or the deadline passes
    while (Date.now() < deadline && !this.forced) {
      const active = server?.activeConnections() ?? 0
      if (active === 0) break
      consola.info("Waiting for active connections to finish...", { active })
      await new Promise((r) => setTimeout(r, this.pollIntervalMs))
    }

    if (this.forced || (server?.activeConnections() ?? 0) > 0) {
      this.forceTerminate()
      return
    }

    await Promise.allSettled(hookPromises)
    // With the listener still open the accept loop would never return
    if (listenerClosed) await this.serving
    consola.info("Shutdown complete")
    this.finish(0)
  }

  private installSignalHandlers() {
    process.on("SIGTERM", () => this.handleSignal("SIGTERM"))
    process.on("SIGINT", () => this.handleSignal("SIGINT"))
    process.on("SIGHUP", () => this.handleSignal("SIGHUP"))

    // Global error handlers: ensure we attempt a controlled shutdown on fatal errors
    process.on("uncaughtException", (err) => {
      consola.error("Uncaught exception, initiating shutdown:", err)
      void this.beginShutdown("fatal")
    })

    process.on("unhandledRejection", (reason) => {
      consola.error("Unhandled rejection, initiating shutdown:", reason)
      void this.beginShutdown("fatal")
    })
  }

  // Handle system signals; ensures single-owner and idempotent behavior
  private handleSignal(signal: string) {
    consola.info("Signal received:", signal)
    if (this.state === "draining") {
      // Second signal => the drain loop stops waiting on its next pass
      consola.warn(
        "Second signal received during shutdown: forcing immediate termination",
      )
      this.forced = true
      return
    }

    void this.beginShutdown(signal)
  }

  // Drop every remaining connection and exit non-zero
  private forceTerminate() {
    consola.warn("Shutdown deadline reached or forced; forcing termination")
    this.server?.destroyAll()

    // Exit with a deterministic non-zero code (2 -> forced termination)
    this.finish(2)
  }

  private finish(code: number) {
    this.exitCode = code
    if (this.exitOnShutdown) {
      process.exit(code)
    }
    // In test mode we do not exit the process; transition to stopped state
    this.state = "stopped"
    consola.info(`Shutdown finished with code ${code} (no exit in test mode)`)
  }
}
