import { NetClosedError } from "../src/listener/errors"
import type {
  Conn,
  KeepAliveControl,
  Listener,
  ListenerAddress,
} from "../src/listener/types"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

// In-memory connection: reads come from push(), writes are recorded as text
export class FakeConn implements Conn, KeepAliveControl {
  readonly written: Array<string> = []
  readonly keepAliveCalls: Array<[boolean, number]> = []
  closeCalls = 0
  destroyCalls = 0
  private readonly chunks: Array<Uint8Array | null> = []
  private pendingRead: ((chunk: Uint8Array | null) => void) | null = null
  private closed = false

  constructor(private readonly remote = "127.0.0.1:50000") {}

  push(data: string | null) {
    const chunk = data === null ? null : encoder.encode(data)
    const pending = this.pendingRead
    if (pending) {
      this.pendingRead = null
      pending(chunk)
    } else {
      this.chunks.push(chunk)
    }
  }

  read(): Promise<Uint8Array | null> {
    if (this.closed) return Promise.resolve(null)
    if (this.chunks.length > 0) {
      return Promise.resolve(this.chunks.shift() ?? null)
    }
    return new Promise((resolve) => {
      this.pendingRead = resolve
    })
  }

  write(chunk: Uint8Array | string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error("write on closed connection"))
    }
    this.written.push(typeof chunk === "string" ? chunk : decoder.decode(chunk))
    return Promise.resolve()
  }

  close(): Promise<void> {
    this.closeCalls += 1
    this.shut()
    return Promise.resolve()
  }

  destroy(): void {
    this.destroyCalls += 1
    this.shut()
  }

  localAddress(): string | undefined {
    return "127.0.0.1:7000"
  }

  remoteAddress(): string | undefined {
    return this.remote
  }

  setKeepAlive(enable: boolean, periodMs: number): void {
    this.keepAliveCalls.push([enable, periodMs])
  }

  private shut() {
    this.closed = true
    const pending = this.pendingRead
    this.pendingRead = null
    pending?.(null)
  }
}

type Result<C> = { conn: C } | { error: unknown }

interface FakeListenerOptions {
  // Reject accepts still pending when close() runs (like an OS listener)
  failPendingOnClose?: boolean
  closeError?: Error
}

// Scripted listener: accept() takes the next yielded connection or failure
// and waits when there is none
export class FakeListener<C extends Conn = FakeConn> implements Listener<C> {
  closeCalls = 0
  private readonly results: Array<Result<C>> = []
  private readonly waiters: Array<{
    resolve: (conn: C) => void
    reject: (err: unknown) => void
  }> = []
  private closed = false

  constructor(private readonly options: FakeListenerOptions = {}) {}

  yieldConn(conn: C) {
    this.settle({ conn })
  }

  fail(error: unknown) {
    this.settle({ error })
  }

  pendingAccepts(): number {
    return this.waiters.length
  }

  accept(): Promise<C> {
    const result = this.results.shift()
    if (result && "conn" in result) return Promise.resolve(result.conn)
    if (result) return Promise.reject(result.error)
    if (this.closed) return Promise.reject(new NetClosedError("accept"))
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject })
    })
  }

  close(): Promise<void> {
    this.closeCalls += 1
    if (this.options.closeError) return Promise.reject(this.options.closeError)
    this.closed = true
    if (this.options.failPendingOnClose ?? true) {
      const err = new NetClosedError("accept")
      for (const waiter of this.waiters.splice(0)) waiter.reject(err)
    }
    return Promise.resolve()
  }

  address(): ListenerAddress {
    return { address: "127.0.0.1", family: "IPv4", port: 7000 }
  }

  private settle(result: Result<C>) {
    const waiter = this.waiters.shift()
    if (!waiter) {
      this.results.push(result)
    } else if ("conn" in result) {
      waiter.resolve(result.conn)
    } else {
      waiter.reject(result.error)
    }
  }
}

// Lets pending promise callbacks run
export function flush(): Promise<void> {
  return new Promise((r) => setTimeout(r, 0))
}
