/**
 * Path store benchmarks
 *
 * Packing per-class lists, and the lookups both sampling protocols rely on.
 */

import { Bench } from 'tinybench'
import { PathStore } from '@patchset/datasets'
import type { BenchmarkSuite, BenchmarkConfig } from '../lib/types.js'
import { DATASET_SIZES, syntheticIndex } from '../lib/utils.js'

export const suite: BenchmarkSuite = {
  name: 'Path Store',
  category: 'index',

  async run(config: BenchmarkConfig) {
    const bench = new Bench({
      time: config.time ?? 1000,
      warmup: config.warmup ?? true,
    })

    for (const [classes, perClass] of config.sizes ?? DATASET_SIZES) {
      const label = `${classes}x${perClass}`
      const { store } = syntheticIndex(classes, perClass)
      const lists = Array.from({ length: classes }, (_, c) =>
        Array.from({ length: perClass }, (_, i) => store.path(c * perClass + i + 1)),
      )

      bench.add(`fromClassLists ${label}`, () => {
        PathStore.fromClassLists(lists)
      })

      let position = 0
      bench.add(`path() ${label}`, () => {
        position = (position % store.size) + 1
        store.path(position)
      })

      let classIndex = 0
      bench.add(`classPosition() ${label}`, () => {
        classIndex = (classIndex % classes) + 1
        store.classPosition(classIndex, perClass)
      })
    }

    await bench.run()
    return bench
  },
}

export default suite
