#!/usr/bin/env node
import "dotenv/config"
import { hideBin } from "yargs/helpers"
import { cli } from "./src/run/cli"

cli(hideBin(process.argv))
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error(err)
    process.exit(1)
  })
