import {
  SqlState,
  INSUFFICIENT_RESOURCES_CLASS,
} from "../db/postgres/constants"

export type ProvisioningErrorKind =
  | "duplicate-database"
  | "missing-role"
  | "insufficient-privilege"
  | "unreachable"
  | "authentication"
  | "storage"
  | "invalid-input"
  | "unknown"

/**
 * Every failure of a provisioning step surfaces as this error. `code` holds
 * the SQLSTATE or Node system error code reported by the driver, if any.
 */
export class ProvisioningError extends Error {
  readonly kind: ProvisioningErrorKind
  readonly code?: string

  constructor(
    kind: ProvisioningErrorKind,
    message: string,
    options: { code?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause })
    this.name = "ProvisioningError"
    this.kind = kind
    this.code = options.code
  }
}

const UNREACHABLE_CODES = [
  "ECONNREFUSED",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EHOSTUNREACH",
  "ECONNRESET",
  "EAI_AGAIN",
  SqlState.CANNOT_CONNECT_NOW,
]

// pg reports handshake timeouts and dropped sockets without a code
const UNREACHABLE_MESSAGE =
  /timeout expired|connection timeout|Connection terminated|Query read timeout/i

export function errorCode(e: unknown): string | undefined {
  if (typeof e === "object" && e !== null && "code" in e) {
    return typeof e.code === "string" ? e.code : undefined
  }
  return undefined
}

const errorMessage = (e: unknown): string =>
  e instanceof Error ? e.message : String(e)

export function classify(
  code: string | undefined,
  message = ""
): ProvisioningErrorKind {
  if (code === undefined) {
    return UNREACHABLE_MESSAGE.test(message) ? "unreachable" : "unknown"
  }
  if (UNREACHABLE_CODES.includes(code)) return "unreachable"
  if (code.startsWith(INSUFFICIENT_RESOURCES_CLASS)) return "storage"

  switch (code) {
    case SqlState.DUPLICATE_DATABASE:
      return "duplicate-database"
    case SqlState.UNDEFINED_OBJECT:
      return "missing-role"
    case SqlState.INSUFFICIENT_PRIVILEGE:
      return "insufficient-privilege"
    case SqlState.INVALID_PASSWORD:
    case SqlState.INVALID_AUTHORIZATION:
      return "authentication"
    default:
      return "unknown"
  }
}

export function toProvisioningError(e: unknown): ProvisioningError {
  if (e instanceof ProvisioningError) return e
  const code = errorCode(e)
  const message = errorMessage(e)
  return new ProvisioningError(classify(code, message), message, {
    code,
    cause: e,
  })
}

export const classifyErrors = <Args extends unknown[], Result>(
  fn: (...args: Args) => Promise<Result>
) => (...args: Args): Promise<Result> =>
  fn(...args).catch((e: unknown) => Promise.reject(toProvisioningError(e)))
