import nodeFs from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import path from 'node:path';
import type { IgnoreOracle } from '../git/ignore-oracle';
import { VCS_METADATA_DIR } from '../scanner/types';
import { byName } from '../scanner/utils';

type Fs = typeof nodeFs;

export interface RenderTreeOptions {
  /** Heading line, rendered as `<name>/` */
  name: string;
  respectIgnore?: boolean;
  oracle: IgnoreOracle;
}

interface TreeItem {
  name: string;
  absPath: string;
  isDir: boolean;
  /** Only real directories are expanded; links to directories are listed but not entered */
  expand: boolean;
}

const BRANCH = '├── ';
const LAST_BRANCH = '└── ';
const PIPE_INDENT = '│   ';
const SPACE_INDENT = '    ';

/**
 * Renders the hierarchy under `root` with box-drawing connectors, one entry per line,
 * directories suffixed with `/`. Unlistable directories render as `[Access Error]`.
 */
export async function renderTree(
  root: string,
  options: RenderTreeOptions,
  fs: Fs = nodeFs,
): Promise<string> {
  const rootPath = path.resolve(root);
  const lines = [`${options.name}/`];

  const renderDir = async (dir: string, prefix: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch {
      lines.push(`${prefix}[Access Error]`);
      return;
    }

    const items = await toItems(dir, entries);

    for (const [i, item] of items.entries()) {
      const isLast = i === items.length - 1;
      lines.push(`${prefix}${isLast ? LAST_BRANCH : BRANCH}${item.name}${item.isDir ? '/' : ''}`);
      if (item.expand) {
        await renderDir(item.absPath, prefix + (isLast ? SPACE_INDENT : PIPE_INDENT));
      }
    }
  };

  const toItems = async (dir: string, entries: Dirent[]): Promise<TreeItem[]> => {
    const items: TreeItem[] = [];
    for (const entry of [...entries].sort((a, b) => byName(a.name, b.name))) {
      if (entry.name === VCS_METADATA_DIR) continue;
      const absPath = path.join(dir, entry.name);
      if (options.respectIgnore && (await options.oracle.isExcluded(rootPath, absPath))) {
        continue;
      }
      const isDir = entry.isDirectory() || (entry.isSymbolicLink() && (await isDirLink(absPath)));
      items.push({ name: entry.name, absPath, isDir, expand: entry.isDirectory() });
    }
    return items;
  };

  const isDirLink = async (absPath: string): Promise<boolean> => {
    try {
      return (await fs.stat(absPath)).isDirectory();
    } catch {
      return false;
    }
  };

  await renderDir(rootPath, '');
  return lines.join('\n') + '\n';
}
