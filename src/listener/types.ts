import type { AddressInfo } from "node:net"

// Last protocol state observed for a connection. "new" doubles as the unset
// value: every connection starts there.
export type ConnState = "new" | "active" | "idle" | "hijacked" | "closed"

export interface Conn {
  // Resolves with the next chunk, or null once the peer has ended the stream
  read: () => Promise<Uint8Array | null>
  write: (chunk: Uint8Array | string) => Promise<void>
  close: () => Promise<void>
  // Tears the connection down at once, dropping unflushed writes
  destroy: () => void
  localAddress: () => string | undefined
  remoteAddress: () => string | undefined
}

export interface KeepAliveControl {
  setKeepAlive: (enable: boolean, periodMs: number) => void
}

export type ListenerAddress = AddressInfo | string | null

/**
 * Pull-based listener. `close` is not required to be idempotent; wrap the
 * listener in a GracefulListener for that.
 */
export interface Listener<C extends Conn = Conn> {
  accept: () => Promise<C>
  close: () => Promise<void>
  address: () => ListenerAddress
}

export function hasKeepAlive<C extends Conn>(
  conn: C,
): conn is C & KeepAliveControl {
  return "setKeepAlive" in conn && typeof conn.setKeepAlive === "function"
}
