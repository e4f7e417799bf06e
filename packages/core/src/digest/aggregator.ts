import path from 'node:path';
import {
  ROOT_DIRECTORY,
  type DigestEntry,
  type DigestReport,
  type SummaryMap,
} from '@dirdigest/shared';
import { byName } from '@dirdigest/repo';

/**
 * Buckets summaries by containing directory. Sections are sorted by directory
 * name and entries by file name; nothing is added or dropped.
 */
export function groupSummaries(summaries: SummaryMap): DigestReport {
  const buckets = new Map<string, DigestEntry[]>();

  for (const [relPath, summary] of summaries) {
    const dir = path.posix.dirname(toPosix(relPath));
    const directory = dir === '.' ? ROOT_DIRECTORY : dir;
    let entries = buckets.get(directory);
    if (!entries) {
      entries = [];
      buckets.set(directory, entries);
    }
    entries.push({ fileName: path.posix.basename(toPosix(relPath)), summary });
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => byName(a, b))
    .map(([directory, entries]) => ({
      directory,
      entries: [...entries].sort((a, b) => byName(a.fileName, b.fileName)),
    }));
}

function toPosix(relPath: string): string {
  return relPath.split(path.sep).join(path.posix.sep);
}
