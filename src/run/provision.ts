import postgres, {
  AdminSession,
  SessionRunner,
  withSession,
} from "../api/postgres"
import { toProvisioningError } from "../api/errors"
import { ensureRole, Outcome } from "../db/postgres/roles"
import { ensureDatabase } from "../db/postgres/databases"
import { DatabasePrivilege } from "../db/postgres/constants"
import { ProvisionConfig } from "./config"
import { step, warn } from "./steps"

export type ProvisionReport = {
  role: Outcome
  database: Outcome
  owner?: string
  privileges: DatabasePrivilege[]
}

export function confirmationQuestion(config: ProvisionConfig): string {
  const { admin, role, database } = config
  return `Going to connect to ${admin.host}:${admin.port}/${admin.database} as ${admin.user} and provision:
  login role ${role.name}
  database ${database.name} owned by ${role.name}${
    database.ifNotExists ? " (skipped if it already exists)" : ""
  }\n`
}

/**
 * Role first, then the database owned by it. Runs once, in order, on the
 * given session; the first failure ends the run.
 */
export async function provision(
  session: AdminSession,
  config: ProvisionConfig
): Promise<ProvisionReport> {
  const role = await step<Outcome>(
    `Ensuring login role ${config.role.name}`,
    (outcome, ms) =>
      outcome === "created"
        ? `Created role ${config.role.name} in ${ms}ms`
        : `Role ${config.role.name} already exists`
  )(() => ensureRole(session, config.role))

  if (role === "existing") {
    warn(`Password of existing role ${config.role.name} was left unchanged`)
  }

  const database = await step<Outcome>(
    `Creating database ${config.database.name}`,
    (outcome, ms) =>
      outcome === "created"
        ? `Created database ${config.database.name} and granted all privileges in ${ms}ms`
        : `Database ${config.database.name} already exists, re-granted all privileges`
  )(() =>
    ensureDatabase(session, {
      name: config.database.name,
      owner: config.role.name,
      ifNotExists: config.database.ifNotExists,
    })
  )

  const info = await postgres.fetchDatabase(session, config.database.name)
  const privileges = await postgres.fetchDatabasePrivileges(
    session,
    config.database.name,
    config.role.name
  )

  return { role, database, owner: info?.owner, privileges }
}

export async function run(
  config: ProvisionConfig,
  connect: SessionRunner = withSession
): Promise<ProvisionReport> {
  try {
    return await connect(config.admin, (session) =>
      provision(session, config)
    )
  } catch (e) {
    throw toProvisioningError(e)
  }
}
