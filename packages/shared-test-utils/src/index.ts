/**
 * @patchset/test-utils
 *
 * Shared test utilities for the patchset monorepo
 */

// Matchers
export { setupRasterMatchers, rasterMatchers } from './matchers/raster-matchers.js';

// Mocks
export { MemoryDecoder } from './mocks/memory-decoder.js';

// Fixtures
export { sequentialRaster, constantRaster, rasterRow } from './fixtures/raster-fixtures.js';

// Helpers
export { DatasetTree, solidPng, type TreeEntry } from './helpers/dataset-tree.js';
