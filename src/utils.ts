import * as t from "io-ts"

export const maskSecret = (secret: string) =>
  secret.length <= 4 ? "****" : `${secret.slice(0, 2)}****`

export const sleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * Renders io-ts validation errors as one line per offending key path,
 * e.g. `role.password: expected NonEmptyString`.
 */
export function formatErrors(errors: t.Errors): string[] {
  const lines = errors.map((e) => {
    const path = e.context
      .map((c) => c.key)
      .filter((key) => key !== "" && !/^\d+$/.test(key))
      .join(".")
    const expected = e.context[e.context.length - 1]?.type.name ?? "value"
    return `${path || "<root>"}: ${e.message ?? `expected ${expected}`}`
  })
  return Array.from(new Set(lines))
}
