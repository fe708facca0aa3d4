import ora from "ora"
import debug from "debug"
import logSymbols from "log-symbols"

const NAMESPACES = ["role", "database", "wait", "config", "session"]

export const debugOutputEnabled = () =>
  NAMESPACES.some((name) => debug.enabled(`provision:${name}`))

/**
 * Runs one provisioning step behind a spinner. With debug output on, the
 * spinner would garble the log lines, so plain messages are printed instead.
 */
export const step = <Result>(
  startMessage: string,
  stopMessage: (result: Result, ms: number) => string
) => async (fn: () => Promise<Result>): Promise<Result> => {
  let spinner: ora.Ora | undefined
  if (debugOutputEnabled()) {
    console.log(`${startMessage}...`)
  } else {
    spinner = ora(`${startMessage}...`).start()
  }

  const start = new Date()
  let result: Result
  try {
    result = await fn()
  } catch (e) {
    const failMessage = `${startMessage} failed`
    if (spinner) {
      spinner.fail(failMessage)
    } else {
      console.log(`${logSymbols.error} ${failMessage}`)
    }
    throw e
  }

  const message = stopMessage(result, new Date().getTime() - start.getTime())
  if (spinner) {
    spinner.succeed(message)
  } else {
    console.log(message)
  }
  return result
}

export const warn = (text: string) => console.log(`${logSymbols.warning} ${text}`)
