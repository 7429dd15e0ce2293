/**
 * Raster fixtures with values that are easy to trace by hand
 */

import { createRaster, type Raster } from '@patchset/core';

/**
 * Raster whose value at (c, h, w) is its CHW offset
 *
 * A crop at (top, left) then starts at value `(c * height + top) * width + left`.
 */
export function sequentialRaster(channels: number, height: number, width: number): Raster {
  const data = new Float32Array(channels * height * width);
  for (let i = 0; i < data.length; i++) {
    data[i] = i;
  }
  return createRaster(channels, height, width, data);
}

/**
 * Raster filled with one value per channel
 */
export function constantRaster(height: number, width: number, values: readonly number[]): Raster {
  const plane = height * width;
  const data = new Float32Array(values.length * plane);
  values.forEach((value, c) => data.fill(value, c * plane, (c + 1) * plane));
  return createRaster(values.length, height, width, data);
}

/**
 * Values of one channel row of a raster
 */
export function rasterRow(raster: Raster, channel: number, row: number): number[] {
  const start = (channel * raster.height + row) * raster.width;
  return Array.from(raster.data.subarray(start, start + raster.width));
}
