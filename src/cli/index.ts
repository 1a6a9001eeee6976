#!/usr/bin/env node
import { run } from './program'

run(process.argv).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error(error)
    process.exitCode = 1
  }
)
