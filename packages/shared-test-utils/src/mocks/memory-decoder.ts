import type { Raster } from '@patchset/core';

/**
 * In-memory stand-in for an image decoder
 *
 * Paths registered with `set` decode to their raster; paths registered with
 * `fail`, and unknown paths, reject like a corrupt or missing file would.
 */
export class MemoryDecoder {
  private readonly rasters = new Map<string, Raster>();
  private readonly failures = new Map<string, string>();

  /** Every path passed to `decode`, in call order */
  readonly calls: string[] = [];

  set(path: string, raster: Raster): this {
    this.rasters.set(path, raster);
    this.failures.delete(path);
    return this;
  }

  fail(path: string, reason: string = 'corrupt image data'): this {
    this.failures.set(path, reason);
    this.rasters.delete(path);
    return this;
  }

  async decode(path: string): Promise<Raster> {
    this.calls.push(path);
    const failure = this.failures.get(path);
    if (failure !== undefined) {
      throw new Error(failure);
    }
    const raster = this.rasters.get(path);
    if (raster === undefined) {
      throw new Error(`ENOENT: no such file, open '${path}'`);
    }
    return raster;
  }
}
