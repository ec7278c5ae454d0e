import type { Conn, KeepAliveControl, Listener, ListenerAddress } from "./types"

// Probe period for accepted connections, so peers that vanished without a
// FIN are eventually reaped
export const KEEP_ALIVE_PERIOD_MS = 3 * 60 * 1000

// Turns on TCP keep-alive for every connection the inner listener accepts.
export class KeepAliveListener<C extends Conn & KeepAliveControl>
  implements Listener<C>
{
  constructor(
    private readonly inner: Listener<C>,
    private readonly periodMs: number = KEEP_ALIVE_PERIOD_MS,
  ) {}

  async accept(): Promise<C> {
    const conn = await this.inner.accept()
    conn.setKeepAlive(true, this.periodMs)
    return conn
  }

  close(): Promise<void> {
    return this.inner.close()
  }

  address(): ListenerAddress {
    return this.inner.address()
  }
}
