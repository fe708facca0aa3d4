import debug from "debug"
import postgres, { AdminSession } from "../../api/postgres"
import { classifyErrors, errorCode } from "../../api/errors"
import { SqlState } from "./constants"

const debugLog = debug("provision:role")

export type RoleSpec = {
  name: string
  password: string
}

export type Outcome = "created" | "existing"

async function createRole(session: AdminSession, role: RoleSpec) {
  await session.query(
    `CREATE ROLE ${session.escapeIdentifier(
      role.name
    )} LOGIN PASSWORD ${session.escapeLiteral(role.password)}`
  )
}

/**
 * Makes sure a login role called `role.name` exists. An existing role is left
 * untouched, including its password.
 */
async function plainEnsureRole(
  session: AdminSession,
  role: RoleSpec
): Promise<Outcome> {
  if (await postgres.roleExists(session, role.name)) {
    debugLog(`Role ${role.name} already exists, leaving it as is`)
    return "existing"
  }

  try {
    await createRole(session, role)
  } catch (e) {
    // Someone else created it between our check and our CREATE
    if (errorCode(e) === SqlState.DUPLICATE_OBJECT) {
      debugLog(`Role ${role.name} appeared concurrently`)
      return "existing"
    }
    throw e
  }

  debugLog(`Created login role ${role.name}`)
  return "created"
}

export const ensureRole = classifyErrors(plainEnsureRole)
