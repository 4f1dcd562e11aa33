// file: src/FileScanner.ts
import { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Determine whether the given file path has one of the wanted extensions (case-insensitive).
 */
export function hasExtension(file: string, extensions: string[]): boolean {
  const ext = path.extname(file).toLowerCase();
  return extensions.includes(ext);
}

async function walk(dir: string, extensions: string[], out: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(full, extensions, out);
    } else if (entry.isFile() && hasExtension(entry.name, extensions)) {
      out.push(full);
    }
  }
}

/**
 * Lists the source files under `root` whose extension is in `extensions`, sorted by path.
 * A file given as `root` is returned on its own if its extension matches.
 * @throws Error if `root` does not exist.
 */
export async function findSourceFiles(root: string, extensions: string[]): Promise<string[]> {
  let stat: Stats;
  try {
    stat = await fs.stat(root);
  } catch (err: unknown) {
    if (
      typeof err === 'object' &&
      err !== null &&
      'code' in err &&
      err.code === 'ENOENT'
    ) {
      throw new Error(`Path not found: ${root}`);
    }
    throw err;
  }
  if (stat.isFile()) {
    return hasExtension(root, extensions) ? [root] : [];
  }
  const files: string[] = [];
  await walk(root, extensions, files);
  return files.sort();
}
