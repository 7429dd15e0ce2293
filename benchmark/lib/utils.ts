/**
 * Benchmark utility functions
 */

import { createRaster, type Raster } from '@patchset/core'
import { ClassCatalog, PathStore, type DatasetIndex, type ImageDecoder } from '@patchset/datasets'

/**
 * Format time value for display
 * @param us - Time in microseconds
 */
export function formatTime(us: number): string {
  if (us < 1) {
    return `${(us * 1000).toFixed(1)}ns`
  }
  if (us < 1000) {
    return `${us.toFixed(1)}μs`
  }
  if (us < 1000000) {
    return `${(us / 1000).toFixed(2)}ms`
  }
  return `${(us / 1000000).toFixed(2)}s`
}

/**
 * Format ops/sec for display
 */
export function formatOps(ops: number): string {
  if (ops >= 1000000) {
    return `${(ops / 1000000).toFixed(2)}M`
  }
  if (ops >= 1000) {
    return `${(ops / 1000).toFixed(2)}K`
  }
  return ops.toFixed(0)
}

export function pad(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  if (str.length >= width) return str
  const padding = ' '.repeat(width - str.length)
  return align === 'left' ? str + padding : padding + str
}

/**
 * Synthetic dataset sizes as [classes, images per class]
 */
export const DATASET_SIZES: Array<[number, number]> = [
  [10, 1_000],
  [100, 1_000],
  [1_000, 100],
]

/**
 * In-memory index shaped like an ImageNet-style tree, without touching disk
 */
export function syntheticIndex(numClasses: number, perClass: number): DatasetIndex {
  const names = Array.from({ length: numClasses }, (_, c) => `n${String(c).padStart(8, '0')}`)
  const directories = new Map(names.map((name) => [name, [`/bench/train/${name}`]]))
  const lists = names.map((name) =>
    Array.from({ length: perClass }, (_, i) => `/bench/train/${name}/${name}_${i}.JPEG`),
  )
  return {
    roots: ['/bench/train'],
    catalog: ClassCatalog.fromDirectories(directories),
    store: PathStore.fromClassLists(lists),
  }
}

/**
 * Decoder returning one shared raster for every path
 */
export class ConstantDecoder implements ImageDecoder {
  private readonly raster: Raster

  constructor(height: number, width: number) {
    const data = new Float32Array(3 * height * width)
    for (let i = 0; i < data.length; i++) {
      data[i] = (i % 251) / 250
    }
    this.raster = createRaster(3, height, width, data)
  }

  async decode(): Promise<Raster> {
    return this.raster
  }
}
