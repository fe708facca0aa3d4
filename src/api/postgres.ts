import { Client } from "pg"
import * as t from "io-ts"
import { isRight } from "fp-ts/lib/Either"
import debug from "debug"
import { DatabasePrivilege } from "../db/postgres/constants"
import { formatErrors } from "../utils"

const debugLog = debug("provision:session")

export type ConnectionInfo = {
  user: string
  host: string
  database: string
  password?: string
  port: number
  // pg treats 0 or absent as no limit
  connectionTimeoutMillis?: number
  queryTimeoutMillis?: number
}

/**
 * The slice of a pg client the provisioning routines need. Kept narrow so
 * tests can stand in an in-memory catalog for a real server.
 */
export interface AdminSession {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>
  escapeIdentifier(name: string): string
  escapeLiteral(value: string): string
}

export async function openSession(
  connectionInfo: ConnectionInfo
): Promise<AdminSession & { close: () => Promise<void> }> {
  const { queryTimeoutMillis, ...settings } = connectionInfo
  const client = new Client({ ...settings, query_timeout: queryTimeoutMillis })
  debugLog(
    `Connecting to ${connectionInfo.host}:${connectionInfo.port}/${connectionInfo.database} as ${connectionInfo.user}`
  )
  await client.connect()
  return {
    query: (text, values) => client.query(text, values),
    escapeIdentifier: (name) => client.escapeIdentifier(name),
    escapeLiteral: (value) => client.escapeLiteral(value),
    close: () => client.end(),
  }
}

export type SessionRunner = <T>(
  connectionInfo: ConnectionInfo,
  fn: (session: AdminSession) => Promise<T>
) => Promise<T>

export async function withSession<T>(
  connectionInfo: ConnectionInfo,
  fn: (session: AdminSession) => Promise<T>
): Promise<T> {
  const session = await openSession(connectionInfo)
  try {
    return await fn(session)
  } finally {
    await session.close()
  }
}

function decodeRows<C extends t.Mixed>(
  codec: C,
  rows: unknown[]
): t.TypeOf<C>[] {
  const decoded = t.array(codec).decode(rows)
  if (isRight(decoded)) {
    return decoded.right
  }
  throw new Error(
    `Unexpected catalog row shape:\n${formatErrors(decoded.left).join("\n")}`
  )
}

async function roleExists(session: AdminSession, name: string) {
  const { rows } = await session.query(
    "SELECT 1 FROM pg_catalog.pg_roles WHERE rolname = $1",
    [name]
  )
  return rows.length > 0
}

async function databaseExists(session: AdminSession, name: string) {
  const { rows } = await session.query(
    "SELECT 1 FROM pg_catalog.pg_database WHERE datname = $1",
    [name]
  )
  return rows.length > 0
}

const RoleRow = t.type({
  rolname: t.string,
  rolcanlogin: t.boolean,
  rolsuper: t.boolean,
})

export type RoleInfo = {
  name: string
  canLogin: boolean
  superUser: boolean
}

async function fetchRole(
  session: AdminSession,
  name: string
): Promise<RoleInfo | undefined> {
  const { rows } = await session.query(
    `SELECT rolname, rolcanlogin, rolsuper
     FROM pg_catalog.pg_roles WHERE rolname = $1`,
    [name]
  )
  return decodeRows(RoleRow, rows).map((r) => ({
    name: r.rolname,
    canLogin: r.rolcanlogin,
    superUser: r.rolsuper,
  }))[0]
}

const DatabaseRow = t.type({ name: t.string, owner: t.string })

export type DatabaseInfo = t.TypeOf<typeof DatabaseRow>

async function fetchDatabase(
  session: AdminSession,
  name: string
): Promise<DatabaseInfo | undefined> {
  const { rows } = await session.query(
    `SELECT d.datname AS name, pg_catalog.pg_get_userbyid(d.datdba) AS owner
     FROM pg_catalog.pg_database d WHERE d.datname = $1`,
    [name]
  )
  return decodeRows(DatabaseRow, rows)[0]
}

const PrivilegeRow = t.type({
  create: t.boolean,
  connect: t.boolean,
  temporary: t.boolean,
})

async function fetchDatabasePrivileges(
  session: AdminSession,
  database: string,
  role: string
): Promise<DatabasePrivilege[]> {
  const { rows } = await session.query(
    `SELECT has_database_privilege($1::name, $2::text, 'CREATE') AS "create",
            has_database_privilege($1::name, $2::text, 'CONNECT') AS "connect",
            has_database_privilege($1::name, $2::text, 'TEMPORARY') AS "temporary"`,
    [role, database]
  )
  const [row] = decodeRows(PrivilegeRow, rows)
  if (!row) return []

  const held: [DatabasePrivilege, boolean][] = [
    [DatabasePrivilege.CREATE, row.create],
    [DatabasePrivilege.CONNECT, row.connect],
    [DatabasePrivilege.TEMPORARY, row.temporary],
  ]
  return held.filter(([, granted]) => granted).map(([privilege]) => privilege)
}

/**
 * Roles other than superusers and the built-in pg_* roles that hold
 * `privilege` on `database`.
 */
async function fetchRolesWithPrivilege(
  session: AdminSession,
  database: string,
  privilege: DatabasePrivilege
): Promise<string[]> {
  const { rows } = await session.query(
    `SELECT r.rolname AS name
     FROM pg_catalog.pg_roles r
     WHERE NOT r.rolsuper
       AND r.rolname !~ '^pg_'
       AND has_database_privilege(r.oid, $1::text, $2::text)
     ORDER BY 1`,
    [database, privilege]
  )
  return decodeRows(t.type({ name: t.string }), rows).map((r) => r.name)
}

async function ping(session: AdminSession) {
  await session.query("SELECT 1")
}

export default {
  roleExists,
  databaseExists,
  fetchRole,
  fetchDatabase,
  fetchDatabasePrivileges,
  fetchRolesWithPrivilege,
  ping,
}
