import { expect, test } from "vitest"

import { runServer } from "../src/start"

const options = {
  port: 7000,
  host: "127.0.0.1",
  keepAliveSeconds: 180,
  shutdownTimeoutSeconds: 30,
  verbose: false,
}

test("runServer rejects a port that is not a number", async () => {
  await expect(runServer({ ...options, port: Number.NaN })).rejects.toThrow(
    "Invalid value for --port: NaN",
  )
})

test("runServer rejects a zero keep-alive period", async () => {
  await expect(runServer({ ...options, keepAliveSeconds: 0 })).rejects.toThrow(
    "--keep-alive must be greater than zero",
  )
})
