/**
 * Benchmark CLI entry point
 *
 * Usage:
 *   npm run bench
 *   npm run bench -- --category sampling
 *   npm run bench -- --filter "path store"
 *   npm run bench -- --json
 */

import { dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Logger } from '@patchset/core'
import { BenchmarkRunner, CATEGORIES } from './lib/runner.js'
import type { BenchmarkConfig } from './lib/types.js'

function parseArgs(): BenchmarkConfig {
  const args = process.argv.slice(2)
  const config: BenchmarkConfig = {
    time: 1000,
    warmup: true,
  }
  const output = { console: true, json: false }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    const value = args[i + 1]

    if (arg === '--category' && value) {
      config.category = value
      i++
    } else if (arg === '--filter' && value) {
      config.filter = value
      i++
    } else if (arg === '--time' && value) {
      config.time = parseInt(value, 10)
      i++
    } else if (arg === '--json') {
      output.json = true
    } else if (arg === '--no-warmup') {
      config.warmup = false
    } else if (arg === '--help' || arg === '-h') {
      printHelp()
      process.exit(0)
    }
  }

  config.output = output
  return config
}

function printHelp(): void {
  console.log(`
patchset benchmarks

Usage:
  npm run bench -- [options]

Options:
  --category <name>   Filter by category (${CATEGORIES.join(', ')})
  --filter <pattern>  Filter suites by name pattern
  --json              Save results to benchmark/results
  --time <ms>         Time per task in ms (default: 1000)
  --no-warmup         Skip warmup phase
  --help, -h          Show this help message
`)
}

async function main(): Promise<void> {
  Logger.setLevel('silent')
  const config = parseArgs()
  const runner = new BenchmarkRunner(config)

  await runner.discover(dirname(fileURLToPath(import.meta.url)))
  await runner.run()
}

main().catch((err) => {
  console.error('Benchmark failed:', err)
  process.exit(1)
})
