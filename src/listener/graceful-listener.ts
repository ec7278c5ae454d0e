import { ListenerAlreadyClosedError } from "./errors"
import { GracefulConn } from "./graceful-conn"
import type { Conn, Listener, ListenerAddress } from "./types"

/**
 * Listener decorator for graceful shutdown.
 *
 * Differs from the wrapped listener in two ways: `close` may be called any
 * number of times from any task and closes the inner listener once, and an
 * `accept` that fails after the close rejects with
 * {@link ListenerAlreadyClosedError} so the accept loop can tell a shutdown
 * from a real failure.
 *
 * The flag is read when the inner accept fails, not when accept is called. A
 * failure that races a close can still be classified either way; callers
 * needing exact classification must coordinate with the inner listener.
 */
export class GracefulListener<C extends Conn = Conn>
  implements Listener<GracefulConn<C>>
{
  private open = true

  constructor(private readonly inner: Listener<C>) {}

  async accept(): Promise<GracefulConn<C>> {
    let conn: C
    try {
      conn = await this.inner.accept()
    } catch (err) {
      if (!this.open) {
        throw new ListenerAlreadyClosedError(err)
      }
      throw err
    }
    return new GracefulConn(conn)
  }

  // Test-and-set in one synchronous step: only the first caller reaches the
  // inner close and sees its result, everyone else resolves at once.
  async close(): Promise<void> {
    if (!this.open) return
    this.open = false
    await this.inner.close()
  }

  address(): ListenerAddress {
    return this.inner.address()
  }

  isOpen(): boolean {
    return this.open
  }

  unwrap(): Listener<C> {
    return this.inner
  }
}
