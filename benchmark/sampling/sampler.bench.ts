/**
 * Sampling benchmarks
 *
 * Balanced and indexed batches over a synthetic index with a decoder that
 * never touches disk, so the numbers measure the engine alone.
 */

import { Bench } from 'tinybench'
import { Normalizer, Sampler, TransformPipeline } from '@patchset/datasets'
import type { BenchmarkSuite, BenchmarkConfig } from '../lib/types.js'
import { ConstantDecoder, syntheticIndex } from '../lib/utils.js'

export const suite: BenchmarkSuite = {
  name: 'Sampler',
  category: 'sampling',

  async run(config: BenchmarkConfig) {
    const bench = new Bench({
      time: config.time ?? 1000,
      warmup: config.warmup ?? true,
    })

    const dataset = syntheticIndex(100, 1_000)
    const pipeline = new TransformPipeline([3, 51, 51], { decoder: new ConstantDecoder(64, 64) })
    const sampler = new Sampler(dataset, pipeline, { seed: 1 })
    const tenCrop = new Sampler(dataset, pipeline, { seed: 1, strategy: 'tenCrop' })
    const normalizer = new Normalizer()
    await normalizer.fit(sampler, { targetImageCount: 256, batchSize: 64 })
    const indices = Array.from({ length: 32 }, (_, i) => i * 97 + 1)

    bench.add('sample(32)', async () => {
      await sampler.sample(32)
    })

    bench.add('sample(32) x 4 crops', async () => {
      await sampler.sample(32, { samplesPerImage: 4 })
    })

    bench.add('index(32 positions)', async () => {
      await sampler.index(indices)
    })

    bench.add('index(8 positions) tenCrop', async () => {
      await tenCrop.index(indices.slice(0, 8))
    })

    bench.add('sample(32) + normalize', async () => {
      normalizer.apply(await sampler.sample(32))
    })

    await bench.run()
    return bench
  },
}

export default suite
