/**
 * Benchmark result reporter
 * Prints a table per suite and optionally saves the whole run as JSON
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { BenchmarkResults, SuiteResult, BenchmarkResult, OutputConfig } from './types.js'
import { formatTime, formatOps, pad } from './utils.js'

const NAME_WIDTH = 40

export class Reporter {
  private startTime = 0

  constructor(private config: OutputConfig = {}) {}

  private get toConsole(): boolean {
    return this.config.console !== false
  }

  start(numSuites: number): void {
    this.startTime = Date.now()
    if (!this.toConsole) return

    console.log('')
    console.log(`patchset benchmarks (${numSuites} suite${numSuites === 1 ? '' : 's'})`)
    console.log('')
  }

  suiteStart(name: string, category: string): void {
    if (!this.toConsole) return
    console.log(`[${category}] ${name}`)
    console.log(`  ${pad('task', NAME_WIDTH)} │ ${pad('ops/sec', 12, 'right')} │ ${pad('mean', 10, 'right')} │ rme`)
  }

  suiteEnd(result: SuiteResult): void {
    if (!this.toConsole) return
    for (const bench of result.benchmarks) {
      console.log(formatRow(bench))
    }
    console.log(`  (${(result.duration / 1000).toFixed(1)}s)`)
    console.log('')
  }

  /**
   * Print the summary and write the JSON file when enabled
   */
  async finish(results: BenchmarkResults): Promise<void> {
    const duration = Date.now() - this.startTime
    if (this.toConsole) {
      printSummary(results, duration)
    }
    if (this.config.json) {
      const filepath = await this.writeJson(results)
      console.log(`Results written to: ${filepath}`)
    }
  }

  private async writeJson(results: BenchmarkResults): Promise<string> {
    const outputDir = this.config.jsonPath ?? './benchmark/results'
    await mkdir(outputDir, { recursive: true })

    const timestamp = results.timestamp.replace(/[:.]/g, '-')
    const filepath = join(outputDir, `benchmark-${timestamp}.json`)
    await writeFile(filepath, JSON.stringify(results, null, 2))
    return filepath
  }
}

function formatRow(bench: BenchmarkResult): string {
  const name = pad(bench.name, NAME_WIDTH)
  const ops = pad(formatOps(bench.opsPerSec), 12, 'right')
  const time = pad(formatTime(bench.meanUs), 10, 'right')
  return `  ${name} │ ${ops} │ ${time} │ ±${bench.rme.toFixed(1)}%`
}

function printSummary(results: BenchmarkResults, duration: number): void {
  const all = results.suites.flatMap((s) => s.benchmarks)
  if (all.length === 0) {
    console.log('No benchmarks were run.')
    return
  }

  const slowest = all.reduce((a, b) => (a.opsPerSec < b.opsPerSec ? a : b))
  console.log(`${all.length} tasks in ${(duration / 1000).toFixed(1)}s`)
  console.log(`Slowest: ${slowest.name} @ ${formatOps(slowest.opsPerSec)} ops/sec`)
  console.log('')
}
