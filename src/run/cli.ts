import fs from "fs"
import inquirer from "inquirer"
import debug from "debug"
import logSymbols from "log-symbols"
import yargs from "yargs"
import { ProvisioningError } from "../api/errors"
import { SessionRunner, withSession } from "../api/postgres"
import { connectionUrl } from "../db/postgres/constants"
import {
  ProvisionConfig,
  applicationConnection,
  configFromEnv,
  parseConfig,
} from "./config"
import { confirmationQuestion, run as provisionRun } from "./provision"
import { run as verifyRun } from "./verify"
import { run as waitRun } from "./wait"
import { checkEnvironment, formatEnvironmentReport } from "./env"

const debugLog = debug("provision:config")

type Env = Record<string, string | undefined>

export type CliOptions = {
  env?: Env
  connect?: SessionRunner
  confirm?: (message: string) => Promise<boolean>
}

export function loadConfig(configFile: string | undefined, env: Env) {
  if (!configFile) {
    debugLog("No config file given, reading the environment")
    return configFromEnv(env)
  }

  debugLog(`Reading config file ${configFile}`)
  let json: unknown
  try {
    json = JSON.parse(fs.readFileSync(configFile).toString())
  } catch (e) {
    throw new ProvisioningError(
      "invalid-input",
      `Could not read config file ${configFile}: ${
        e instanceof Error ? e.message : e
      }`,
      { cause: e }
    )
  }
  return parseConfig(json, `config file ${configFile}`)
}

async function ask(message: string): Promise<boolean> {
  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: "confirm",
      message,
      name: "proceed",
    },
  ])
  return proceed
}

const configFileOption = {
  alias: "c",
  type: "string",
  describe: "Path to a JSON config file; the environment is used otherwise",
} as const

/**
 * Parses `args` and runs the chosen command. Resolves with the process exit
 * status; errors are printed, never thrown.
 */
export async function cli(
  args: string[],
  { env = process.env, connect = withSession, confirm = ask }: CliOptions = {}
): Promise<number> {
  let exitCode = 0

  try {
    await yargs(args)
      .scriptName("shipsec-provision")
      .option("verbose", {
        alias: "v",
        type: "boolean",
        default: false,
        describe: "verbose",
      })
      .middleware((argv) => {
        if (argv.verbose) debug.enable("*")
      })
      .command(
        "provision",
        "Create the application's login role and database",
        (y) =>
          y
            .option("config-file", configFileOption)
            .option("yes", {
              alias: "y",
              type: "boolean",
              default: false,
              describe: "Do not ask for confirmation",
            })
            .option("if-not-exists", {
              type: "boolean",
              default: false,
              describe: "Skip CREATE DATABASE when the database already exists",
            }),
        async (argv) => {
          const loaded = loadConfig(argv.configFile, env)
          const config: ProvisionConfig = argv.ifNotExists
            ? { ...loaded, database: { ...loaded.database, ifNotExists: true } }
            : loaded

          if (!argv.yes && !(await confirm(confirmationQuestion(config)))) {
            console.log("Skipping provisioning")
            return
          }

          const report = await provisionRun(config, connect)
          const app = applicationConnection(config)
          console.log(
            `${logSymbols.success} Role ${report.role}, database ${
              report.database
            }, owner ${report.owner ?? "unknown"}, privileges ${
              report.privileges.join(", ") || "none"
            }`
          )
          console.log(
            `Application URL: ${connectionUrl(
              app.user,
              "****",
              app.host,
              app.port,
              app.database
            )}`
          )
        }
      )
      .command(
        "verify",
        "Check ownership and privileges of the provisioned database",
        (y) => y.option("config-file", configFileOption),
        async (argv) => {
          const report = await verifyRun(
            loadConfig(argv.configFile, env),
            connect
          )
          report.notes.forEach((n) => console.log(`${logSymbols.info} ${n}`))
          if (report.ok) {
            console.log(`${logSymbols.success} Database is provisioned correctly`)
            return
          }
          report.problems.forEach((p) => console.log(`${logSymbols.error} ${p}`))
          exitCode = 1
        }
      )
      .command(
        "wait",
        "Wait until the database server accepts connections",
        (y) =>
          y
            .option("config-file", configFileOption)
            .option("timeout", {
              type: "number",
              default: 30000,
              describe: "Give up after this many milliseconds",
            })
            .option("interval", {
              type: "number",
              default: 1000,
              describe: "Milliseconds between attempts",
            }),
        async (argv) => {
          const config = loadConfig(argv.configFile, env)
          await waitRun(
            config.admin,
            { timeoutMs: argv.timeout, intervalMs: argv.interval },
            connect
          )
        }
      )
      .command(
        "env",
        "Check the environment variables the webhook backend needs",
        (y) => y,
        () => {
          const report = checkEnvironment(env)
          formatEnvironmentReport(report).forEach((line) => console.log(line))
          if (!report.complete) {
            console.log(`${logSymbols.error} Environment is incomplete`)
            exitCode = 1
          }
        }
      )
      .demandCommand(1)
      .strict()
      .fail(false)
      .exitProcess(false)
      .help("h")
      .alias("h", "help")
      .parseAsync()
  } catch (err) {
    if (err instanceof ProvisioningError) {
      console.error(`${logSymbols.error} [${err.kind}] ${err.message}`)
    } else {
      console.error(err)
    }
    return 1
  }

  return exitCode
}
