import * as t from "io-ts"
import { isRight } from "fp-ts/lib/Either"
import { withFallback } from "io-ts-types/lib/withFallback"
import { NonEmptyString } from "io-ts-types/lib/NonEmptyString"
import { NumberFromString } from "io-ts-types/lib/NumberFromString"
import { BooleanFromString } from "io-ts-types/lib/BooleanFromString"
import { SYSTEM_DATABASES } from "../db/postgres/constants"
import { ProvisioningError } from "../api/errors"
import { formatErrors } from "../utils"

// Unquoted Postgres identifiers, capped at NAMEDATALEN - 1
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_$]{0,62}$/

interface IdentifierBrand {
  readonly Identifier: unique symbol
}

export const Identifier = t.brand(
  t.string,
  (s): s is t.Branded<string, IdentifierBrand> => IDENTIFIER_PATTERN.test(s),
  "Identifier"
)

export type Identifier = t.TypeOf<typeof Identifier>

interface DatabaseNameBrand {
  readonly DatabaseName: unique symbol
}

export const DatabaseName = t.brand(
  Identifier,
  (s): s is t.Branded<Identifier, DatabaseNameBrand> =>
    !SYSTEM_DATABASES.includes(s.toLowerCase()),
  "DatabaseName"
)

interface PortBrand {
  readonly Port: unique symbol
}

export const Port = t.brand(
  t.number,
  (n): n is t.Branded<number, PortBrand> =>
    Number.isInteger(n) && n > 0 && n < 65536,
  "Port"
)

const PortFromString = NumberFromString.pipe(Port, "PortFromString")

const AdminConnection = t.intersection([
  t.readonly(
    t.type({
      host: t.string,
      port: Port,
      user: t.string,
      database: t.string,
    })
  ),
  t.readonly(
    t.partial({
      password: t.string,
    })
  ),
])

export const ProvisionConfig = t.type({
  admin: AdminConnection,
  role: t.type({
    name: Identifier,
    password: NonEmptyString,
  }),
  database: t.type({
    name: DatabaseName,
    ifNotExists: withFallback(t.boolean, false),
  }),
})

export type ProvisionConfig = t.TypeOf<typeof ProvisionConfig>

/**
 * The environment form of a ProvisionConfig. Everything arrives as strings;
 * admin settings fall back to the application's HOST/PORT and to the
 * conventional `postgres` superuser and maintenance database.
 */
const ProvisionEnv = t.intersection([
  t.type({
    DB_USER: Identifier,
    PASSWD: NonEmptyString,
    DB_NAME: DatabaseName,
    HOST: withFallback(t.string, "localhost"),
    ADMIN_USER: withFallback(t.string, "postgres"),
    ADMIN_DATABASE: withFallback(t.string, "postgres"),
  }),
  t.partial({
    PORT: PortFromString,
    ADMIN_HOST: t.string,
    ADMIN_PORT: PortFromString,
    ADMIN_PASSWORD: t.string,
    DB_IF_NOT_EXISTS: BooleanFromString,
  }),
])

const DEFAULT_PORT = 5432

function decodeOrReject<C extends t.Mixed>(
  codec: C,
  input: unknown,
  source: string
): t.TypeOf<C> {
  const decoded = codec.decode(input)
  if (isRight(decoded)) {
    return decoded.right
  }
  const errors = formatErrors(decoded.left).join("\n")
  throw new ProvisioningError(
    "invalid-input",
    `Could not parse ${source} because of errors at keys:\n${errors}`
  )
}

export function parseConfig(json: unknown, source = "config file") {
  return decodeOrReject(ProvisionConfig, json, source)
}

export function configFromEnv(
  env: Record<string, string | undefined>
): ProvisionConfig {
  const e = decodeOrReject(ProvisionEnv, env, "environment")
  const port = e.PORT ?? DEFAULT_PORT

  return parseConfig(
    {
      admin: {
        host: e.ADMIN_HOST ?? e.HOST,
        port: e.ADMIN_PORT ?? port,
        user: e.ADMIN_USER,
        database: e.ADMIN_DATABASE,
        ...(e.ADMIN_PASSWORD !== undefined && { password: e.ADMIN_PASSWORD }),
      },
      role: { name: e.DB_USER, password: e.PASSWD },
      database: { name: e.DB_NAME, ifNotExists: e.DB_IF_NOT_EXISTS ?? false },
    },
    "environment"
  )
}

/** Where the application itself connects once provisioning is done. */
export const applicationConnection = (config: ProvisionConfig) => ({
  host: config.admin.host,
  port: config.admin.port,
  user: config.role.name,
  password: config.role.password,
  database: config.database.name,
})
