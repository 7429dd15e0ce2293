/**
 * ImageNet Patch Sampling Example
 *
 * Builds the train/validation indices of a prepared ILSVRC2012 directory,
 * fits normalization stats and draws a few balanced batches.
 *
 * Usage: tsx examples/imagenet-patches.ts ./data/imagenet
 */

import { loadImageNetPatchSet } from '@patchset/datasets'

async function main() {
  console.log('=== ImageNet patches ===\n')

  const datapath = process.argv[2] ?? './data/imagenet'

  console.log(`Indexing ${datapath}...`)
  const t0 = Date.now()
  const { train, valid } = await loadImageNetPatchSet(datapath, {
    sampleShape: [3, 64, 64],
    sampleNorm: true,
    trainSamplesPerImage: 2,
    testCenterFirst: true,
    seed: 1,
    verbose: true,
  })
  console.log(`Classes: ${train.classes.length}, Train: ${train.size()}, Valid: ${valid.size()}`)
  console.log(`Indexed in ${((Date.now() - t0) / 1000).toFixed(1)}s\n`)

  // Stats are fitted once and shared by every later batch
  console.log('Fitting normalization...')
  const stats = await train.normalization(2000)
  console.log(`mean [${stats.mean.map((m) => m.toFixed(3)).join(', ')}]`)
  console.log(`std  [${stats.std.map((s) => s.toFixed(3)).join(', ')}]\n`)

  for (let step = 1; step <= 3; step++) {
    const batch = await train.sample(32)
    const classes = new Set(batch.labels).size
    console.log(`Batch ${step}: shape [${batch.shape.join(', ')}], ${classes} distinct classes`)
  }

  // Ten views per validation image, in index order
  const views = await valid.index([1, 2, 3], { strategy: 'tenCrop' })
  console.log(`\nTen-crop of 3 images: shape [${views.shape.join(', ')}]`)

  console.log('\n=== Done ===')
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
