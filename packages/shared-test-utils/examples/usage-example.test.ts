/**
 * Example usage of @patchset/test-utils
 * This file demonstrates all the utilities provided by the package
 */

import { readFile } from 'fs/promises';
import { describe, test, expect, beforeAll } from 'vitest';
import { PNG } from 'pngjs';
import {
  setupRasterMatchers,
  MemoryDecoder,
  DatasetTree,
  sequentialRaster,
  constantRaster,
  rasterRow,
} from '../src/index.js';

// Setup custom matchers
beforeAll(() => {
  setupRasterMatchers();
});

describe('Custom Matchers', () => {
  test('toHaveShape matcher', () => {
    expect(constantRaster(2, 3, [0, 0])).toHaveShape([2, 2, 3]);
    expect({ shape: [4, 1, 2, 2] }).toHaveShape([4, 1, 2, 2]);
    expect({ shape: [4, 1] }).not.toHaveShape([4, 1, 2, 2]);
  });

  test('toBeAllCloseTo matcher', () => {
    expect(new Float32Array([0.1, 0.2])).toBeAllCloseTo([0.1, 0.2]);
    expect(constantRaster(1, 2, [0.5])).toBeAllCloseTo(0.5);
    expect({ samples: new Float32Array([1, 2]) }).toBeAllCloseTo([1, 2.05], 0.1);
    expect([1, 2]).not.toBeAllCloseTo([1, 3]);
  });
});

describe('Raster Fixtures', () => {
  test('sequentialRaster', () => {
    const raster = sequentialRaster(2, 2, 3);

    expect(raster).toHaveShape([2, 2, 3]);
    expect(rasterRow(raster, 1, 0)).toEqual([6, 7, 8]);
  });

  test('constantRaster', () => {
    const raster = constantRaster(1, 2, [0.25, 0.75]);

    expect(Array.from(raster.data)).toEqual([0.25, 0.25, 0.75, 0.75]);
  });
});

describe('MemoryDecoder', () => {
  test('decodes registered rasters and records calls', async () => {
    const raster = sequentialRaster(1, 1, 1);
    const decoder = new MemoryDecoder().set('/a.png', raster);

    await expect(decoder.decode('/a.png')).resolves.toBe(raster);
    await expect(decoder.decode('/b.png')).rejects.toThrow("ENOENT: no such file, open '/b.png'");
    expect(decoder.calls).toEqual(['/a.png', '/b.png']);
  });

  test('fails registered paths', async () => {
    const decoder = new MemoryDecoder().set('/a.png', sequentialRaster(1, 1, 1)).fail('/a.png');

    await expect(decoder.decode('/a.png')).rejects.toThrow('corrupt image data');
  });
});

describe('DatasetTree', () => {
  test('writes PNG and text entries', async () => {
    const tree = await DatasetTree.create({
      'cat/a.png': { png: { width: 2, height: 1, rgb: [10, 20, 30] } },
      'cat/notes.txt': { text: 'hello' },
    });

    try {
      const png = PNG.sync.read(await readFile(tree.path('cat', 'a.png')));
      expect([png.width, png.height]).toEqual([2, 1]);
      expect(Array.from(png.data.subarray(0, 4))).toEqual([10, 20, 30, 255]);
      expect(await readFile(tree.path('cat/notes.txt'), 'utf8')).toBe('hello');
    } finally {
      await tree.cleanup();
    }
  });
});
