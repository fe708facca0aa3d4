import postgres, {
  AdminSession,
  SessionRunner,
  withSession,
} from "../api/postgres"
import { toProvisioningError } from "../api/errors"
import {
  ALL_DATABASE_PRIVILEGES,
  DatabasePrivilege,
} from "../db/postgres/constants"
import { ProvisionConfig } from "./config"

export type VerifyReport = {
  ok: boolean
  problems: string[]
  // Facts worth knowing that do not fail verification
  notes: string[]
}

const PUBLIC_ROLE = "public"

/**
 * Checks the state provisioning leaves behind: the database is owned by the
 * role, the role can log in and holds every database privilege, and no other
 * ordinary role may create schemas in it.
 *
 * CONNECT and TEMPORARY granted to PUBLIC, which Postgres does for every new
 * database, are reported as a note rather than a problem.
 */
export async function verify(
  session: AdminSession,
  target: { database: string; owner: string }
): Promise<VerifyReport> {
  const problems: string[] = []

  const role = await postgres.fetchRole(session, target.owner)
  if (!role) {
    problems.push(`Role ${target.owner} does not exist`)
  } else if (!role.canLogin) {
    problems.push(`Role ${target.owner} cannot log in`)
  }

  const database = await postgres.fetchDatabase(session, target.database)
  if (!database) {
    problems.push(`Database ${target.database} does not exist`)
    return { ok: false, problems, notes: [] }
  }
  if (database.owner !== target.owner) {
    problems.push(
      `Database ${target.database} is owned by ${database.owner}, expected ${target.owner}`
    )
  }

  if (role) {
    const held = await postgres.fetchDatabasePrivileges(
      session,
      target.database,
      target.owner
    )
    const missing = ALL_DATABASE_PRIVILEGES.filter((p) => !held.includes(p))
    if (missing.length > 0) {
      problems.push(
        `Role ${target.owner} lacks ${missing.join(", ")} on ${target.database}`
      )
    }
  }

  const others = (
    await postgres.fetchRolesWithPrivilege(
      session,
      target.database,
      DatabasePrivilege.CREATE
    )
  ).filter((name) => name !== target.owner)
  if (others.length > 0) {
    problems.push(
      `Other roles hold CREATE on ${target.database}: ${others.join(", ")}`
    )
  }

  const publicPrivileges = await postgres.fetchDatabasePrivileges(
    session,
    target.database,
    PUBLIC_ROLE
  )
  const notes =
    publicPrivileges.length > 0
      ? [
          `PUBLIC holds ${publicPrivileges.join(", ")} on ${
            target.database
          }, which every role inherits`,
        ]
      : []

  return { ok: problems.length === 0, problems, notes }
}

export async function run(
  config: ProvisionConfig,
  connect: SessionRunner = withSession
): Promise<VerifyReport> {
  try {
    return await connect(config.admin, (session) =>
      verify(session, {
        database: config.database.name,
        owner: config.role.name,
      })
    )
  } catch (e) {
    throw toProvisioningError(e)
  }
}
