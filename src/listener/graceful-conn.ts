import { hasKeepAlive, type Conn, type ConnState } from "./types"

// A connection handed out by GracefulListener. Reads, writes and close go
// straight to the wrapped connection; the only addition is lastState, which
// the owning server overwrites from its single state-change callback.
// Nothing here synchronizes writes to it.
export class GracefulConn<C extends Conn = Conn> implements Conn {
  lastState: ConnState = "new"

  constructor(private readonly inner: C) {}

  read(): Promise<Uint8Array | null> {
    return this.inner.read()
  }

  write(chunk: Uint8Array | string): Promise<void> {
    return this.inner.write(chunk)
  }

  close(): Promise<void> {
    return this.inner.close()
  }

  destroy(): void {
    this.inner.destroy()
  }

  localAddress(): string | undefined {
    return this.inner.localAddress()
  }

  remoteAddress(): string | undefined {
    return this.inner.remoteAddress()
  }

  setKeepAlive(enable: boolean, periodMs: number): void {
    if (hasKeepAlive(this.inner)) {
      this.inner.setKeepAlive(enable, periodMs)
    }
  }

  unwrap(): C {
    return this.inner
  }
}
