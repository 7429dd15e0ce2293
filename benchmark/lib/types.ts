/**
 * Benchmark system type definitions
 */

import type { Bench, Task } from 'tinybench'

/**
 * Configuration for benchmark runs
 */
export interface BenchmarkConfig {
  /** Time in ms per benchmark (default: 1000) */
  time?: number
  /** Whether to warm up before measuring (default: true) */
  warmup?: boolean
  /** Synthetic dataset sizes as [classes, images per class] */
  sizes?: Array<[number, number]>
  /** Output configuration */
  output?: OutputConfig
  /** Filter benchmarks by name pattern */
  filter?: string
  /** Filter by category */
  category?: string
}

/**
 * Output configuration
 */
export interface OutputConfig {
  /** Output to console (default: true) */
  console?: boolean
  /** Output to JSON file */
  json?: boolean
  /** Path for JSON output */
  jsonPath?: string
}

/**
 * Individual benchmark result
 */
export interface BenchmarkResult {
  name: string
  opsPerSec: number
  /** Mean time per operation in microseconds */
  meanUs: number
  stdDev: number
  minUs: number
  maxUs: number
  p75Us: number
  p99Us: number
  samples: number
  /** Relative margin of error (percentage) */
  rme: number
}

export interface SuiteResult {
  name: string
  /** Category (index, sampling) */
  category: string
  benchmarks: BenchmarkResult[]
  /** Total time to run suite in ms */
  duration: number
}

export interface BenchmarkResults {
  /** ISO timestamp */
  timestamp: string
  platform: PlatformInfo
  suites: SuiteResult[]
  /** Total duration in ms */
  totalDuration: number
}

export interface PlatformInfo {
  os: string
  arch: string
  nodeVersion: string
}

/**
 * Benchmark suite definition
 */
export interface BenchmarkSuite {
  name: string
  category: string
  run(config: BenchmarkConfig): Promise<Bench>
}

export function isBenchmarkSuite(value: unknown): value is BenchmarkSuite {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    'category' in value &&
    'run' in value &&
    typeof value.run === 'function'
  )
}

/**
 * Extract results from tinybench Task
 */
export function extractTaskResult(task: Task): BenchmarkResult | null {
  const result = task.result
  if (!result) return null

  const meanUs = result.mean * 1000 // ms to us

  return {
    name: task.name,
    opsPerSec: Math.round(result.hz),
    meanUs,
    stdDev: (result.sd ?? 0) * 1000,
    minUs: (result.min ?? result.mean) * 1000,
    maxUs: (result.max ?? result.mean) * 1000,
    p75Us: (result.p75 ?? result.mean) * 1000,
    p99Us: (result.p99 ?? result.mean) * 1000,
    samples: result.samples?.length ?? 0,
    rme: result.rme ?? 0,
  }
}
