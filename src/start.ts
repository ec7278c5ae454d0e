import { defineCommand } from "citty"
import consola from "consola"

import { DaemonController } from "./daemon/controller"

interface RunServerOptions {
  port: number
  host: string
  keepAliveSeconds: number
  shutdownTimeoutSeconds: number
  verbose: boolean
}

export async function runServer(options: RunServerOptions): Promise<void> {
  if (options.verbose) {
    consola.level = 5
    consola.info("Verbose logging enabled")
  }

  for (const [flag, value] of [
    ["--port", options.port],
    ["--keep-alive", options.keepAliveSeconds],
    ["--shutdown-timeout", options.shutdownTimeoutSeconds],
  ] as const) {
    if (!Number.isFinite(value) || value < 0) {
      throw new Error(`Invalid value for ${flag}: ${value}`)
    }
  }
  if (options.keepAliveSeconds === 0) {
    throw new Error("--keep-alive must be greater than zero")
  }

  // DaemonController owns signals and the shutdown sequence; the listener it
  // starts closes idempotently so a repeated signal is harmless
  const controller = new DaemonController({
    port: options.port,
    host: options.host,
    keepAlivePeriodMs: options.keepAliveSeconds * 1000,
    shutdownTimeoutMs: options.shutdownTimeoutSeconds * 1000,
  })

  try {
    await controller.start()
  } catch (error) {
    consola.error("Failed to start daemon:", error)
    // Ensure non-zero exit for supervisor visibility
    process.exit(1)
  }
}

export const start = defineCommand({
  meta: {
    name: "start",
    description: "Start the echo server with graceful shutdown",
  },
  args: {
    port: {
      alias: "p",
      type: "string",
      default: "7000",
      description: "Port to listen on",
    },
    host: {
      type: "string",
      default: "127.0.0.1",
      description: "Address to bind",
    },
    "keep-alive": {
      type: "string",
      default: "180",
      description: "TCP keep-alive period for accepted connections, in seconds",
    },
    "shutdown-timeout": {
      type: "string",
      default: "30",
      description:
        "Seconds to wait for connections to drain before closing them forcibly",
    },
    verbose: {
      alias: "v",
      type: "boolean",
      default: false,
      description: "Enable verbose logging",
    },
  },
  run({ args }) {
    return runServer({
      port: Number.parseInt(args.port, 10),
      host: args.host,
      keepAliveSeconds: Number.parseInt(args["keep-alive"], 10),
      shutdownTimeoutSeconds: Number.parseInt(args["shutdown-timeout"], 10),
      verbose: args.verbose,
    })
  },
})
