import {
  ProvisioningError,
  classify,
  classifyErrors,
  errorCode,
  toProvisioningError,
} from "../../src/api/errors"

test.each([
  ["42P04", "duplicate-database"],
  ["42704", "missing-role"],
  ["42501", "insufficient-privilege"],
  ["28P01", "authentication"],
  ["28000", "authentication"],
  ["53100", "storage"],
  ["53200", "storage"],
  ["ECONNREFUSED", "unreachable"],
  ["ENOTFOUND", "unreachable"],
  ["57P03", "unreachable"],
  ["22023", "unknown"],
  [undefined, "unknown"],
])("classify(%s) is %s", (code, kind) => {
  expect(classify(code)).toBe(kind)
})

test("errorCode only reads string codes", () => {
  expect(errorCode({ code: "42P04" })).toBe("42P04")
  expect(errorCode({ code: 42 })).toBeUndefined()
  expect(errorCode("42P04")).toBeUndefined()
  expect(errorCode(null)).toBeUndefined()
})

test("toProvisioningError keeps the driver error as cause", () => {
  const driverError = Object.assign(
    new Error('database "shipsec" already exists'),
    { code: "42P04" }
  )

  const error = toProvisioningError(driverError)

  expect(error).toBeInstanceOf(ProvisioningError)
  expect(error.kind).toBe("duplicate-database")
  expect(error.code).toBe("42P04")
  expect(error.message).toBe('database "shipsec" already exists')
  expect(error.cause).toBe(driverError)
})

test("toProvisioningError passes provisioning errors through", () => {
  const error = new ProvisioningError("invalid-input", "bad config")
  expect(toProvisioningError(error)).toBe(error)
})

test("toProvisioningError accepts non-Error values", () => {
  const error = toProvisioningError("socket hang up")
  expect(error.kind).toBe("unknown")
  expect(error.message).toBe("socket hang up")
})

test("classifyErrors rejects with a ProvisioningError", async () => {
  const failing = classifyErrors(async (name: string) => {
    throw Object.assign(new Error(`role "${name}" does not exist`), {
      code: "42704",
    })
  })

  await expect(failing("shipsec_user")).rejects.toMatchObject({
    name: "ProvisioningError",
    kind: "missing-role",
  })
})

test.each([
  ["timeout expired", "unreachable"],
  ["Connection terminated due to connection timeout", "unreachable"],
  ["Connection terminated unexpectedly", "unreachable"],
  ["Query read timeout", "unreachable"],
  ["socket hang up", "unknown"],
])("an uncoded driver error %j is %s", (message, kind) => {
  expect(toProvisioningError(new Error(message)).kind).toBe(kind)
})
