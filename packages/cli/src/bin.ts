#!/usr/bin/env tsx
import { run } from './autoroute'

// exitCode rather than exit(): `generate --watch` keeps running after run() resolves
run(process.argv).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error(error)
    process.exitCode = 1
  }
)
