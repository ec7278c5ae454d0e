export {
  ListenerAlreadyClosedError,
  NetClosedError,
  isListenerAlreadyClosed,
  isTemporaryAcceptError,
} from "./errors"
export { GracefulConn } from "./graceful-conn"
export { GracefulListener } from "./graceful-listener"
export { KEEP_ALIVE_PERIOD_MS, KeepAliveListener } from "./keep-alive-listener"
export {
  SocketConn,
  TcpListener,
  listenGraceful,
  type ListenGracefulOptions,
  type TcpListenOptions,
} from "./tcp-listener"
export {
  hasKeepAlive,
  type Conn,
  type ConnState,
  type KeepAliveControl,
  type Listener,
  type ListenerAddress,
} from "./types"
