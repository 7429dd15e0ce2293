import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { PNG } from 'pngjs';

/**
 * A file in a temporary dataset tree: a solid-color PNG, or raw text
 */
export type TreeEntry =
  | { png: { width: number; height: number; rgb?: readonly [number, number, number] } }
  | { text: string }
  | 'dir';

/**
 * Encode a solid-color RGBA PNG
 */
export function solidPng(width: number, height: number, rgb: readonly [number, number, number] = [128, 128, 128]): Buffer {
  const png = new PNG({ width, height });
  for (let i = 0; i < width * height; i++) {
    png.data[i * 4] = rgb[0];
    png.data[i * 4 + 1] = rgb[1];
    png.data[i * 4 + 2] = rgb[2];
    png.data[i * 4 + 3] = 255;
  }
  return PNG.sync.write(png);
}

/**
 * Temporary directory tree for filesystem tests
 *
 * @example
 * ```ts
 * const tree = await DatasetTree.create({
 *   'train/cat/a.png': { png: { width: 8, height: 8 } },
 *   'train/dog/b.png': { png: { width: 8, height: 8 } },
 *   'train/empty': 'dir',
 * })
 * // ...
 * await tree.cleanup()
 * ```
 */
export class DatasetTree {
  private constructor(readonly root: string) {}

  static async create(entries: Record<string, TreeEntry> = {}): Promise<DatasetTree> {
    const tree = new DatasetTree(await mkdtemp(join(tmpdir(), 'patchset-')));
    await tree.add(entries);
    return tree;
  }

  /**
   * Absolute path of a tree-relative path
   */
  path(...segments: string[]): string {
    return join(this.root, ...segments);
  }

  async add(entries: Record<string, TreeEntry>): Promise<void> {
    for (const [relative, entry] of Object.entries(entries)) {
      const target = this.path(relative);
      if (entry === 'dir') {
        await mkdir(target, { recursive: true });
        continue;
      }
      await mkdir(dirname(target), { recursive: true });
      if ('png' in entry) {
        await writeFile(target, solidPng(entry.png.width, entry.png.height, entry.png.rgb));
      } else {
        await writeFile(target, entry.text);
      }
    }
  }

  async cleanup(): Promise<void> {
    await rm(this.root, { recursive: true, force: true });
  }
}
