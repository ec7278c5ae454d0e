import consola from "consola"
import net from "node:net"
import invariant from "tiny-invariant"

import { NetClosedError } from "./errors"
import { GracefulListener } from "./graceful-listener"
import { KEEP_ALIVE_PERIOD_MS, KeepAliveListener } from "./keep-alive-listener"
import type { Conn, KeepAliveControl, Listener, ListenerAddress } from "./types"

export interface TcpListenOptions {
  port: number
  host?: string
}

export interface ListenGracefulOptions extends TcpListenOptions {
  keepAlivePeriodMs?: number
}

type Waiter = {
  resolve: (conn: SocketConn) => void
  reject: (err: unknown) => void
}

type Arrival = { socket: net.Socket } | { error: Error }

// Conn over a node:net socket. Reads pull from the socket's async iterator so
// the caller decides when the next chunk is consumed.
export class SocketConn implements Conn, KeepAliveControl {
  private reader: AsyncIterator<unknown> | null = null

  constructor(private readonly socket: net.Socket) {
    socket.on("error", (err) => {
      consola.debug(`Socket error (${this.remoteAddress() ?? "unknown"}):`, err)
    })
  }

  async read(): Promise<Uint8Array | null> {
    const reader = (this.reader ??= this.socket[Symbol.asyncIterator]())
    const { value, done } = await reader.next()
    if (done) return null
    return value instanceof Uint8Array ? value : Buffer.from(String(value))
  }

  write(chunk: Uint8Array | string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(chunk, (err) => {
        if (err) reject(err)
        else resolve()
      })
    })
  }

  // Flushes pending writes, then tears the socket down without waiting for
  // the peer to end its side. Stays pending while a peer that stopped
  // reading holds the writes back; destroy() settles it.
  close(): Promise<void> {
    if (this.socket.destroyed) return Promise.resolve()
    return new Promise((resolve) => {
      this.socket.once("close", () => resolve())
      this.socket.end(() => this.socket.destroy())
    })
  }

  destroy(): void {
    this.socket.destroy()
  }

  localAddress(): string | undefined {
    return formatAddress(this.socket.localAddress, this.socket.localPort)
  }

  remoteAddress(): string | undefined {
    return formatAddress(this.socket.remoteAddress, this.socket.remotePort)
  }

  setKeepAlive(enable: boolean, periodMs: number): void {
    this.socket.setKeepAlive(enable, periodMs)
  }
}

/**
 * Pull-based listener over a `net.Server`.
 *
 * Sockets that arrive while nobody is waiting in `accept` are queued, and so
 * are pending `accept` calls while no socket has arrived. Like the OS
 * listener it stands in for, `close` is not idempotent: a second call
 * rejects with {@link NetClosedError}, as does any `accept` after the first.
 */
export class TcpListener implements Listener<SocketConn> {
  private readonly arrivals: Array<Arrival> = []
  private readonly waiters: Array<Waiter> = []
  private closed = false

  constructor(private readonly server: net.Server) {
    server.on("connection", (socket) => this.deliver({ socket }))
    server.on("error", (error) => this.deliver({ error }))
  }

  static listen(options: TcpListenOptions): Promise<TcpListener> {
    const server = net.createServer()
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err)
      server.once("error", onError)
      server.listen(options.port, options.host, () => {
        server.off("error", onError)
        consola.debug("Listening on", server.address())
        resolve(new TcpListener(server))
      })
    })
  }

  accept(): Promise<SocketConn> {
    if (this.closed) return Promise.reject(new NetClosedError("accept"))

    const arrival = this.arrivals.shift()
    if (arrival && "socket" in arrival) {
      return Promise.resolve(new SocketConn(arrival.socket))
    }
    if (arrival) return Promise.reject(arrival.error)

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject })
    })
  }

  close(): Promise<void> {
    if (this.closed) return Promise.reject(new NetClosedError("close"))
    this.closed = true

    // Stops listening right away; connections already handed out keep running
    this.server.close()

    for (const arrival of this.arrivals.splice(0)) {
      if ("socket" in arrival) arrival.socket.destroy()
    }
    const err = new NetClosedError("accept")
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(err)
    }
    return Promise.resolve()
  }

  address(): ListenerAddress {
    return this.server.address()
  }

  private deliver(arrival: Arrival) {
    if (this.closed) {
      if ("socket" in arrival) arrival.socket.destroy()
      else consola.debug("Listener error after close:", arrival.error)
      return
    }

    const waiter = this.waiters.shift()
    if (!waiter) {
      this.arrivals.push(arrival)
      return
    }

    if ("socket" in arrival) waiter.resolve(new SocketConn(arrival.socket))
    else waiter.reject(arrival.error)
  }
}

// TCP listener with keep-alive on every accepted socket and idempotent close
export async function listenGraceful(
  options: ListenGracefulOptions,
): Promise<GracefulListener<SocketConn>> {
  invariant(
    Number.isInteger(options.port) && options.port >= 0 && options.port <= 65535,
    `Invalid port: ${options.port}`,
  )
  const periodMs = options.keepAlivePeriodMs ?? KEEP_ALIVE_PERIOD_MS
  invariant(periodMs > 0, `Invalid keep-alive period: ${periodMs}`)

  const tcp = await TcpListener.listen(options)
  return new GracefulListener(new KeepAliveListener(tcp, periodMs))
}

function formatAddress(
  host: string | undefined,
  port: number | undefined,
): string | undefined {
  if (host === undefined) return undefined
  return port === undefined ? host : `${host}:${port}`
}
