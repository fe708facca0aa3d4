import net from "net"
import { run, waitForDatabase } from "../../src/run/wait"
import { pgError } from "../fakes/catalog"

const refused = () => pgError("ECONNREFUSED", "connect ECONNREFUSED 127.0.0.1:5432")

test("retries until the server accepts connections", async () => {
  const ping = jest
    .fn<Promise<void>, []>()
    .mockRejectedValueOnce(refused())
    .mockRejectedValueOnce(pgError("57P03", "the database system is starting up"))
    .mockResolvedValueOnce(undefined)

  await expect(
    waitForDatabase(ping, { timeoutMs: 1000, intervalMs: 1 })
  ).resolves.toBe(3)
  expect(ping).toHaveBeenCalledTimes(3)
})

test("gives up once the timeout is spent", async () => {
  const ping = jest.fn<Promise<void>, []>().mockRejectedValue(refused())

  await expect(
    waitForDatabase(ping, { timeoutMs: 0, intervalMs: 10 })
  ).rejects.toMatchObject({
    kind: "unreachable",
    code: "ECONNREFUSED",
    message:
      "Database still unreachable after 1 attempts: connect ECONNREFUSED 127.0.0.1:5432",
  })
  expect(ping).toHaveBeenCalledTimes(1)
})

test("does not retry errors other than connection failures", async () => {
  const ping = jest
    .fn<Promise<void>, []>()
    .mockRejectedValue(
      pgError("28P01", 'password authentication failed for user "postgres"')
    )

  await expect(
    waitForDatabase(ping, { timeoutMs: 1000, intervalMs: 1 })
  ).rejects.toMatchObject({ kind: "authentication" })
  expect(ping).toHaveBeenCalledTimes(1)
})

test("each attempt gets the time left before the deadline", async () => {
  const ping = jest
    .fn<Promise<void>, [number]>()
    .mockRejectedValueOnce(refused())
    .mockResolvedValueOnce(undefined)

  await waitForDatabase(ping, { timeoutMs: 60000, intervalMs: 1 })

  const [[first], [second]] = ping.mock.calls
  expect(first).toBeGreaterThan(59000)
  expect(first).toBeLessThanOrEqual(60000)
  expect(second).toBeLessThanOrEqual(first)
})

test("a server that accepts the socket but never answers still times out", async () => {
  const sockets = new Set<net.Socket>()
  const server = net.createServer((socket) => {
    sockets.add(socket)
  })
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve))
  const address = server.address()
  if (address === null || typeof address === "string") {
    throw new Error("expected a TCP address")
  }

  const started = Date.now()
  try {
    await expect(
      run(
        {
          host: "127.0.0.1",
          port: address.port,
          user: "postgres",
          database: "postgres",
        },
        { timeoutMs: 500, intervalMs: 100 }
      )
    ).rejects.toMatchObject({
      kind: "unreachable",
      message: expect.stringMatching(
        /^Database still unreachable after \d+ attempts: /
      ),
    })
  } finally {
    sockets.forEach((socket) => socket.destroy())
    await new Promise<void>((resolve) => server.close(() => resolve()))
  }
  expect(Date.now() - started).toBeLessThan(3000)
})
