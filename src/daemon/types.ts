export type LifecycleState =
  | "init"
  | "starting"
  | "ready"
  | "draining"
  | "stopped"
  | "failed"

import type { ListenerAddress } from "~/listener"

export interface DaemonOptions {
  port: number
  host?: string
  keepAlivePeriodMs?: number
  shutdownTimeoutMs?: number
  // How often the drain loop re-checks the connection count
  pollIntervalMs?: number
  // When true, the controller will call process.exit at the end of shutdown.
  // For testing, this can be set to false to avoid terminating the test runner.
  exitOnShutdown?: boolean
  // Tests turn this off so the runner's own process handlers stay untouched
  installSignalHandlers?: boolean
}

// What the controller needs from a running server to drain it
export interface ServerHandle {
  // Runs the accept loop; settles when it ends
  serve: () => Promise<void>
  address: () => ListenerAddress
  close: () => Promise<void>
  closeIdle: () => Promise<number>
  destroyAll: () => void
  activeConnections: () => number
}
