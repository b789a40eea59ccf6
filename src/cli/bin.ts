#!/usr/bin/env node
import { runCLI } from './index'

runCLI(process.argv.slice(2))
  .then((result) => {
    process.exitCode = result.exitCode
  })
  .catch((err: unknown) => {
    console.error(err)
    process.exitCode = 1
  })
