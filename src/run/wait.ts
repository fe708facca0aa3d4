import debug from "debug"
import postgres, {
  ConnectionInfo,
  SessionRunner,
  withSession,
} from "../api/postgres"
import { ProvisioningError, toProvisioningError } from "../api/errors"
import { sleep } from "../utils"
import { step } from "./steps"

const debugLog = debug("provision:wait")

export type WaitOptions = {
  timeoutMs: number
  intervalMs: number
}

/**
 * Calls `ping` until it resolves. Only connection-level failures are
 * retried; anything else (bad credentials, missing database) is final.
 * Each call gets the milliseconds left before the deadline, which it must
 * not outlive. Resolves with the number of attempts it took.
 */
export async function waitForDatabase(
  ping: (timeoutMs: number) => Promise<void>,
  { timeoutMs, intervalMs }: WaitOptions
): Promise<number> {
  const deadline = Date.now() + timeoutMs
  let attempts = 0

  for (;;) {
    attempts++
    try {
      await ping(Math.max(deadline - Date.now(), 1))
      return attempts
    } catch (e) {
      const error = toProvisioningError(e)
      if (error.kind !== "unreachable") throw error

      if (Date.now() + intervalMs > deadline) {
        throw new ProvisioningError(
          "unreachable",
          `Database still unreachable after ${attempts} attempts: ${error.message}`,
          { code: error.code, cause: e }
        )
      }
      debugLog(`Attempt ${attempts} failed (${error.message}), retrying`)
      await sleep(intervalMs)
    }
  }
}

export function run(
  admin: ConnectionInfo,
  options: WaitOptions,
  connect: SessionRunner = withSession
) {
  return step<number>(
    `Waiting for ${admin.host}:${admin.port}`,
    (attempts, ms) =>
      `Database at ${admin.host}:${admin.port} is accepting connections (${attempts} attempts, ${ms}ms)`
  )(() =>
    waitForDatabase(
      (timeoutMs) =>
        connect(
          {
            ...admin,
            connectionTimeoutMillis: timeoutMs,
            queryTimeoutMillis: timeoutMs,
          },
          postgres.ping
        ),
      options
    )
  )
}
