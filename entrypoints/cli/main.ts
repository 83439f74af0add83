#!/usr/bin/env node
import { run } from './run'

run(process.argv.slice(2), process.env)
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    console.error('[CLI] 未处理的错误:', err)
    process.exitCode = 1
  })
