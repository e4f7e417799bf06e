import nodeFs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import { errorMessage, type Logger, type PathEntry } from '@dirdigest/shared';
import type { IgnoreOracle } from '../git/ignore-oracle';
import { VCS_METADATA_DIR, type TreeWalkerDeps, type WalkOptions } from './types';
import { byName } from './utils';

export * from './types';
export { byName } from './utils';

type Fs = typeof nodeFs;

/**
 * Depth-first file enumeration. At each level the ignore decisions for
 * subdirectories are made first, then the level's files are yielded in name
 * order, then the surviving subdirectories are walked in name order.
 */
export class TreeWalker {
  private readonly oracle: IgnoreOracle;
  private readonly logger?: Logger;
  private readonly fs: Fs;

  constructor(deps: TreeWalkerDeps, fs: Fs = nodeFs) {
    this.oracle = deps.oracle;
    this.logger = deps.logger;
    this.fs = fs;
  }

  async *walk(root: string, options: WalkOptions = {}): AsyncGenerator<PathEntry> {
    const rootPath = path.resolve(root);
    yield* this.walkDir(rootPath, rootPath, '', options.respectIgnore ?? false);
  }

  async collect(root: string, options: WalkOptions = {}): Promise<PathEntry[]> {
    const entries: PathEntry[] = [];
    for await (const entry of this.walk(root, options)) {
      entries.push(entry);
    }
    return entries;
  }

  private async *walkDir(
    rootPath: string,
    dir: string,
    relativeDir: string,
    respectIgnore: boolean,
  ): AsyncGenerator<PathEntry> {
    let entries: Dirent[];
    try {
      entries = await this.fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      // Access denied or deleted during scan
      this.logger?.warn(`Cannot list directory ${relativeDir || '.'}: ${errorMessage(error)}`);
      return;
    }

    const dirs: string[] = [];
    const files: string[] = [];
    for (const entry of entries) {
      if (entry.isDirectory()) {
        if (entry.name !== VCS_METADATA_DIR) dirs.push(entry.name);
      } else if (entry.isFile() || (await this.isLinkToFile(entry, dir))) {
        files.push(entry.name);
      }
    }

    const keptDirs: string[] = [];
    for (const name of dirs.sort(byName)) {
      if (respectIgnore && (await this.oracle.isExcluded(rootPath, path.join(dir, name)))) {
        this.logger?.debug(`Skipping ignored directory ${path.join(relativeDir, name)}`);
        continue;
      }
      keptDirs.push(name);
    }

    for (const name of files.sort(byName)) {
      const absPath = path.join(dir, name);
      if (respectIgnore && (await this.oracle.isExcluded(rootPath, absPath))) {
        continue;
      }
      yield { absPath, relPath: path.join(relativeDir, name) };
    }

    for (const name of keptDirs) {
      yield* this.walkDir(
        rootPath,
        path.join(dir, name),
        path.join(relativeDir, name),
        respectIgnore,
      );
    }
  }

  private async isLinkToFile(entry: Dirent, dir: string): Promise<boolean> {
    if (!entry.isSymbolicLink()) return false;
    try {
      const stats = await this.fs.stat(path.join(dir, entry.name));
      return stats.isFile();
    } catch {
      // dangling link
      return false;
    }
  }
}
