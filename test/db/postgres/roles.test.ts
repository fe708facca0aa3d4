import { ensureRole } from "../../../src/db/postgres/roles"
import { ProvisioningError } from "../../../src/api/errors"
import { FakeCatalog, pgError } from "../../fakes/catalog"

const shipsecUser = { name: "shipsec_user", password: "test-secret" }

test("creates a login role that does not exist yet", async () => {
  const catalog = new FakeCatalog()

  await expect(ensureRole(catalog, shipsecUser)).resolves.toBe("created")
  expect(catalog.roles.get("shipsec_user")).toEqual({
    canLogin: true,
    superUser: false,
    password: "test-secret",
  })
})

test("is idempotent: a second run succeeds and leaves exactly one role", async () => {
  const catalog = new FakeCatalog()

  await ensureRole(catalog, shipsecUser)
  await expect(ensureRole(catalog, shipsecUser)).resolves.toBe("existing")

  const createStatements = catalog.statements.filter((s) =>
    s.startsWith("CREATE ROLE")
  )
  expect(createStatements).toHaveLength(1)
  expect(
    Array.from(catalog.roles.keys()).filter((name) => name === "shipsec_user")
  ).toHaveLength(1)
})

test("never rotates the password of an existing role", async () => {
  const catalog = new FakeCatalog()
  catalog.addRole("shipsec_user", { password: "old-secret" })

  await expect(
    ensureRole(catalog, { name: "shipsec_user", password: "new-secret" })
  ).resolves.toBe("existing")
  expect(catalog.roles.get("shipsec_user")?.password).toBe("old-secret")
})

test("quotes the role name and escapes the password", async () => {
  const catalog = new FakeCatalog()

  await ensureRole(catalog, { name: "shipsec_user", password: "it's" })

  expect(catalog.statements).toContain(
    `CREATE ROLE "shipsec_user" LOGIN PASSWORD 'it''s'`
  )
  expect(catalog.roles.get("shipsec_user")?.password).toBe("it's")
})

test("treats a role created concurrently as existing", async () => {
  const catalog = new FakeCatalog()
  const query = catalog.query.bind(catalog)
  jest.spyOn(catalog, "query").mockImplementation(async (text, values) => {
    if (text.startsWith("CREATE ROLE")) {
      throw pgError("42710", 'role "shipsec_user" already exists')
    }
    return query(text, values)
  })

  await expect(ensureRole(catalog, shipsecUser)).resolves.toBe("existing")
})

test("reports a missing CREATEROLE privilege", async () => {
  const catalog = new FakeCatalog()
  catalog.canCreateRoles = false

  const error = await ensureRole(catalog, shipsecUser).catch((e) => e)

  expect(error).toBeInstanceOf(ProvisioningError)
  expect(error.kind).toBe("insufficient-privilege")
  expect(error.code).toBe("42501")
  expect(error.message).toBe("permission denied to create role")
})

test("reports an unreachable server", async () => {
  const catalog = new FakeCatalog()
  catalog.connectionError = pgError(
    "ECONNREFUSED",
    "connect ECONNREFUSED 127.0.0.1:5432"
  )

  await expect(ensureRole(catalog, shipsecUser)).rejects.toMatchObject({
    kind: "unreachable",
    message: "connect ECONNREFUSED 127.0.0.1:5432",
  })
})
