import { expect, test } from "vitest"

import { GracefulConn } from "../src/listener/graceful-conn"
import type { Conn } from "../src/listener/types"

import { FakeConn } from "./fake-net"

test("forwards reads, writes and close to the wrapped connection", async () => {
  const raw = new FakeConn("192.168.1.20:53000")
  const conn = new GracefulConn(raw)

  raw.push("abc")
  raw.push(null)
  expect(await conn.read()).toEqual(new TextEncoder().encode("abc"))
  expect(await conn.read()).toBeNull()

  await conn.write(new TextEncoder().encode("xyz"))
  await conn.write("!")
  expect(raw.written).toEqual(["xyz", "!"])

  await conn.close()
  expect(raw.closeCalls).toBe(1)
  conn.destroy()
  expect(raw.destroyCalls).toBe(1)
  expect(conn.localAddress()).toBe("127.0.0.1:7000")
  expect(conn.remoteAddress()).toBe("192.168.1.20:53000")
})

test("state tag starts unset and is overwritten by its owner", () => {
  const conn = new GracefulConn(new FakeConn())

  expect(conn.lastState).toBe("new")
  conn.lastState = "active"
  conn.lastState = "idle"
  expect(conn.lastState).toBe("idle")
})

test("forwards keep-alive only when the connection supports it", () => {
  const raw = new FakeConn()
  new GracefulConn(raw).setKeepAlive(true, 60_000)
  expect(raw.keepAliveCalls).toEqual([[true, 60_000]])

  const plain: Conn = {
    read: () => Promise.resolve(null),
    write: () => Promise.resolve(),
    close: () => Promise.resolve(),
    destroy: () => {},
    localAddress: () => undefined,
    remoteAddress: () => undefined,
  }
  expect(() => new GracefulConn(plain).setKeepAlive(true, 60_000)).not.toThrow()
})
