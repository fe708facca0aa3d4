import * as t from "io-ts"
import { isRight } from "fp-ts/lib/Either"
import { NonEmptyString } from "io-ts-types/lib/NonEmptyString"
import { NumberFromString } from "io-ts-types/lib/NumberFromString"
import { connectionUrl } from "../db/postgres/constants"
import { maskSecret } from "../utils"

type Variable = {
  name: string
  codec: t.Mixed
  secret: boolean
  required: boolean
}

const variable = (
  name: string,
  codec: t.Mixed,
  { secret = false, required = true } = {}
): Variable => ({ name, codec, secret, required })

interface HttpUrlBrand {
  readonly HttpUrl: unique symbol
}

const HttpUrl = t.brand(
  t.string,
  (s): s is t.Branded<string, HttpUrlBrand> => /^https?:\/\/[^\s/]+/.test(s),
  "HttpUrl"
)

/** Everything the webhook backend reads from its environment. */
export const APPLICATION_VARIABLES: Variable[] = [
  variable("DB_USER", NonEmptyString),
  variable("PASSWD", NonEmptyString, { secret: true }),
  variable("DB_NAME", NonEmptyString),
  variable("HOST", NonEmptyString),
  variable("PORT", NumberFromString),
  variable("SHIPSEC_API_KEY", NonEmptyString, { secret: true }),
  variable("SHIPSEC_BASE_URL", HttpUrl),
  variable("VJD_BASE_URL", HttpUrl),
  variable("VJD_API_KEY", NonEmptyString, { secret: true, required: false }),
  variable("WEBHOOK_SECRET", NonEmptyString, { secret: true }),
  variable("SHOPIFY_API_VERSION", NonEmptyString),
]

export type VariableStatus =
  | { name: string; state: "set"; display: string }
  | { name: string; state: "missing"; required: boolean }
  | { name: string; state: "invalid"; expected: string }

export type EnvironmentReport = {
  complete: boolean
  variables: VariableStatus[]
  databaseUrl?: string
}

function inspect(
  v: Variable,
  env: Record<string, string | undefined>
): VariableStatus {
  const raw = env[v.name]
  if (raw === undefined || raw === "") {
    return { name: v.name, state: "missing", required: v.required }
  }
  if (!isRight(v.codec.decode(raw))) {
    return { name: v.name, state: "invalid", expected: v.codec.name }
  }
  return {
    name: v.name,
    state: "set",
    display: v.secret ? maskSecret(raw) : raw,
  }
}

export function checkEnvironment(
  env: Record<string, string | undefined>
): EnvironmentReport {
  const variables = APPLICATION_VARIABLES.map((v) => inspect(v, env))
  const complete = variables.every(
    (s) => s.state === "set" || (s.state === "missing" && !s.required)
  )

  const isSet = (name: string) =>
    variables.some((s) => s.name === name && s.state === "set")
  const { DB_USER, PASSWD, HOST, PORT, DB_NAME } = env
  const databaseUrl =
    DB_USER && PASSWD && HOST && DB_NAME && isSet("PORT")
      ? connectionUrl(DB_USER, "****", HOST, Number(PORT), DB_NAME)
      : undefined

  return { complete, variables, databaseUrl }
}

export function formatEnvironmentReport(report: EnvironmentReport): string[] {
  const lines = report.variables.map((s) => {
    switch (s.state) {
      case "set":
        return `${s.name}=${s.display}`
      case "missing":
        return `${s.name} is not set${s.required ? "" : " (optional)"}`
      case "invalid":
        return `${s.name} is invalid, expected ${s.expected}`
    }
  })
  return report.databaseUrl
    ? [...lines, `Database URL: ${report.databaseUrl}`]
    : lines
}
