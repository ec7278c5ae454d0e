// Rejection of a GracefulListener accept that failed after the listener was
// closed on purpose. Accept loops treat it as the signal to stop, not as a
// fault.
export class ListenerAlreadyClosedError extends Error {
  constructor(cause: unknown) {
    super(`listener already closed: ${describe(cause)}`, { cause })
    this.name = "ListenerAlreadyClosedError"
  }
}

export function isListenerAlreadyClosed(
  err: unknown,
): err is ListenerAlreadyClosedError {
  return err instanceof ListenerAlreadyClosedError
}

// What a raw listener rejects with once it no longer listens
export class NetClosedError extends Error {
  readonly code = "ERR_NET_CLOSED"

  constructor(op: string) {
    super(`${op}: use of closed network connection`)
    this.name = "NetClosedError"
  }
}

const TEMPORARY_CODES = new Set(["EMFILE", "ENFILE", "ECONNABORTED", "ECONNRESET"])

// Accept failures that go away on their own (descriptor exhaustion, a peer
// aborting during the handshake). Worth a retry after a pause.
export function isTemporaryAcceptError(err: unknown): boolean {
  return (
    err instanceof Error
    && "code" in err
    && typeof err.code === "string"
    && TEMPORARY_CODES.has(err.code)
  )
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
