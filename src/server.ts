import consola from "consola"

import {
  isListenerAlreadyClosed,
  isTemporaryAcceptError,
  type Conn,
  type ConnState,
  type GracefulConn,
  type GracefulListener,
  type ListenerAddress,
} from "~/listener"

// Backoff bounds for accept failures the OS expects to clear up
const MIN_ACCEPT_DELAY_MS = 5
const MAX_ACCEPT_DELAY_MS = 1000

// "closed" connections are dropped from tracking, so only live states count
export type ConnStateCounts = Record<Exclude<ConnState, "closed">, number>

// Echo server driving a GracefulListener. The accept loop and the
// per-connection state tag live here, outside the listener layer.
export class EchoServer<C extends Conn = Conn> {
  private readonly conns = new Set<GracefulConn<C>>()
  // Connections this server closed itself; their read errors are expected
  private readonly closing = new WeakSet<GracefulConn<C>>()

  constructor(private readonly listener: GracefulListener<C>) {}

  // Resolves once the listener has been closed on purpose; rejects on any
  // accept failure that is neither a shutdown nor temporary.
  async serve(): Promise<void> {
    let delay = 0

    for (;;) {
      let conn: GracefulConn<C>
      try {
        conn = await this.listener.accept()
      } catch (err) {
        if (isListenerAlreadyClosed(err)) {
          consola.debug("Listener closed, accept loop exiting")
          return
        }
        if (isTemporaryAcceptError(err)) {
          delay = Math.min(
            Math.max(delay * 2, MIN_ACCEPT_DELAY_MS),
            MAX_ACCEPT_DELAY_MS,
          )
          consola.warn(`Accept failed; retrying in ${delay}ms:`, err)
          await new Promise((r) => setTimeout(r, delay))
          continue
        }
        consola.error("Accept failed:", err)
        throw err
      }

      delay = 0
      this.setState(conn, "new")
      consola.debug("Accepted connection from", conn.remoteAddress())
      void this.handle(conn)
    }
  }

  close(): Promise<void> {
    return this.listener.close()
  }

  address(): ListenerAddress {
    return this.listener.address()
  }

  // Closes every connection sitting between requests and reports how many
  async closeIdle(): Promise<number> {
    const idle = [...this.conns].filter(
      (conn) => conn.lastState === "new" || conn.lastState === "idle",
    )
    await Promise.all(idle.map((conn) => this.closeConn(conn)))
    return idle.length
  }

  // Forced path: no flush, so a peer that stopped reading cannot hold it up
  destroyAll(): void {
    for (const conn of this.conns) {
      this.closing.add(conn)
      conn.destroy()
    }
  }

  activeConnections(): number {
    return this.conns.size
  }

  states(): ConnStateCounts {
    const counts: ConnStateCounts = {
      new: 0,
      active: 0,
      idle: 0,
      hijacked: 0,
    }
    for (const conn of this.conns) {
      if (conn.lastState !== "closed") counts[conn.lastState] += 1
    }
    return counts
  }

  private async handle(conn: GracefulConn<C>): Promise<void> {
    try {
      await this.echo(conn)
    } catch (err) {
      if (this.closing.has(conn)) {
        consola.debug("Connection closed during shutdown:", err)
      } else {
        consola.warn(`Connection ${conn.remoteAddress() ?? "unknown"} failed:`, err)
      }
    }

    try {
      await conn.close()
    } catch (err) {
      consola.warn("Failed to close connection:", err)
    }
    this.setState(conn, "closed")
  }

  private async echo(conn: GracefulConn<C>): Promise<void> {
    for (;;) {
      const chunk = await conn.read()
      if (chunk === null) return

      this.setState(conn, "active")
      await conn.write(chunk)
      this.setState(conn, "idle")

      // Draining: finish the exchange in flight but do not wait for another
      if (!this.listener.isOpen()) return
    }
  }

  private async closeConn(conn: GracefulConn<C>): Promise<void> {
    this.closing.add(conn)
    await conn.close()
  }

  // The only writer of lastState
  private setState(conn: GracefulConn<C>, state: ConnState) {
    conn.lastState = state
    if (state === "closed") {
      this.conns.delete(conn)
    } else {
      this.conns.add(conn)
    }
  }
}
