export * from "./listener"
export { EchoServer, type ConnStateCounts } from "./server"
export { DaemonController, startEchoServer, type StartFn } from "./daemon/controller"
export type { DaemonOptions, LifecycleState, ServerHandle } from "./daemon/types"
