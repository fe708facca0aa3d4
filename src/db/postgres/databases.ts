import debug from "debug"
import postgres, { AdminSession } from "../../api/postgres"
import { classifyErrors } from "../../api/errors"
import { Outcome } from "./roles"

const debugLog = debug("provision:database")

export type DatabaseSpec = {
  name: string
  owner: string
  // Skip CREATE DATABASE when the database is already there
  ifNotExists: boolean
}

async function createDatabase(session: AdminSession, database: DatabaseSpec) {
  await session.query(
    `CREATE DATABASE ${session.escapeIdentifier(
      database.name
    )} OWNER ${session.escapeIdentifier(database.owner)}`
  )
}

async function grantAllPrivileges(
  session: AdminSession,
  database: DatabaseSpec
) {
  await session.query(
    `GRANT ALL PRIVILEGES ON DATABASE ${session.escapeIdentifier(
      database.name
    )} TO ${session.escapeIdentifier(database.owner)}`
  )
}

/**
 * Creates `database.name` owned by `database.owner` and grants the owner all
 * privileges on it. Unless `ifNotExists` is set, an existing database makes
 * the CREATE fail with a duplicate-database error and nothing is granted.
 */
async function plainEnsureDatabase(
  session: AdminSession,
  database: DatabaseSpec
): Promise<Outcome> {
  let outcome: Outcome = "created"

  if (
    database.ifNotExists &&
    (await postgres.databaseExists(session, database.name))
  ) {
    debugLog(`Database ${database.name} already exists, skipping CREATE`)
    outcome = "existing"
  } else {
    await createDatabase(session, database)
    debugLog(`Created database ${database.name} owned by ${database.owner}`)
  }

  await grantAllPrivileges(session, database)
  debugLog(`Granted all privileges on ${database.name} to ${database.owner}`)

  return outcome
}

export const ensureDatabase = classifyErrors(plainEnsureDatabase)
