// https://www.postgresql.org/docs/current/errcodes-appendix.html
export enum SqlState {
  DUPLICATE_DATABASE = "42P04",
  DUPLICATE_OBJECT = "42710",
  UNDEFINED_OBJECT = "42704",
  INSUFFICIENT_PRIVILEGE = "42501",
  INVALID_PASSWORD = "28P01",
  INVALID_AUTHORIZATION = "28000",
  CANNOT_CONNECT_NOW = "57P03",
}

// Class 53: insufficient resources (disk full, out of memory, ...)
export const INSUFFICIENT_RESOURCES_CLASS = "53"

export enum DatabasePrivilege {
  CREATE = "CREATE",
  CONNECT = "CONNECT",
  TEMPORARY = "TEMPORARY",
}

// What GRANT ALL PRIVILEGES ON DATABASE expands to
export const ALL_DATABASE_PRIVILEGES: DatabasePrivilege[] = Object.values(
  DatabasePrivilege
)

export const SYSTEM_DATABASES = ["postgres", "template0", "template1"]

export const connectionUrl = (
  user: string,
  password: string,
  host: string,
  port: number,
  database: string
) =>
  `postgresql://${encodeURIComponent(user)}:${encodeURIComponent(
    password
  )}@${host}:${port}/${encodeURIComponent(database)}`
