#!/usr/bin/env node
import * as os from 'os'
import { EXIT_CODE } from '../shared/cli-contract'
import { runCli } from './lib/run'

runCli(process.argv.slice(2), {
  env: process.env,
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
  homeDir: os.homedir(),
})
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    console.error('Unexpected failure:', err)
    process.exitCode = EXIT_CODE.OPERATION_ERROR
  })
