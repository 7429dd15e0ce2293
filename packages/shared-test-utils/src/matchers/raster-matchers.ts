import { expect } from 'vitest';

/**
 * Custom Vitest matchers for rasters and batches
 */

interface RasterMatchers<R = unknown> {
  /**
   * Assert that a raster ([channels, height, width]) or batch has the expected shape
   */
  toHaveShape(expected: readonly number[]): R;

  /**
   * Assert that every value is within tolerance of the expected values
   */
  toBeAllCloseTo(expected: ArrayLike<number> | number, tolerance?: number): R;
}

declare module 'vitest' {
  interface Assertion<T = any> extends RasterMatchers<T> {}
  interface AsymmetricMatchersContaining extends RasterMatchers {}
}

function shapeOf(received: unknown): number[] | undefined {
  if (typeof received !== 'object' || received === null) return undefined;
  if ('shape' in received && Array.isArray(received.shape)) {
    return received.shape.map(Number);
  }
  if (
    'channels' in received &&
    'height' in received &&
    'width' in received &&
    typeof received.channels === 'number' &&
    typeof received.height === 'number' &&
    typeof received.width === 'number'
  ) {
    return [received.channels, received.height, received.width];
  }
  return undefined;
}

function valuesOf(received: unknown): number[] | undefined {
  if (received instanceof Float32Array || received instanceof Float64Array || received instanceof Int32Array) {
    return Array.from(received);
  }
  if (Array.isArray(received) && received.every((v) => typeof v === 'number')) {
    return received;
  }
  if (typeof received === 'object' && received !== null) {
    if ('data' in received) return valuesOf(received.data);
    if ('samples' in received) return valuesOf(received.samples);
  }
  return undefined;
}

function arraysEqual(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((val, idx) => val === b[idx]);
}

export const rasterMatchers = {
  toHaveShape(received: unknown, expected: readonly number[]) {
    const actual = shapeOf(received);
    const pass = actual !== undefined && arraysEqual(actual, expected);

    return {
      pass,
      message: () =>
        pass
          ? `Expected value not to have shape [${expected.join(', ')}], but it does`
          : `Expected value to have shape [${expected.join(', ')}], but got ${actual ? `[${actual.join(', ')}]` : 'no shape'}`,
      actual,
      expected,
    };
  },

  toBeAllCloseTo(received: unknown, expected: ArrayLike<number> | number, tolerance: number = 1e-5) {
    const actual = valuesOf(received) ?? [];
    const expectedArr = typeof expected === 'number' ? actual.map(() => expected) : Array.from(expected);
    const pass =
      actual.length > 0 &&
      actual.length === expectedArr.length &&
      actual.every((val, idx) => Math.abs(val - expectedArr[idx]) <= tolerance);

    return {
      pass,
      message: () =>
        pass
          ? `Expected values not to be close to [${expectedArr.join(', ')}] within tolerance ${tolerance}, but they are`
          : `Expected values to be close to [${expectedArr.join(', ')}] within tolerance ${tolerance}, but got [${actual.join(', ')}]`,
      actual,
      expected: expectedArr,
    };
  },
};

/**
 * Register raster matchers with Vitest
 * Call this in a vitest.setup.ts file
 */
export function setupRasterMatchers(): void {
  expect.extend(rasterMatchers);
}
