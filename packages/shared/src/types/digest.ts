/**
 * A file found by the walker: its absolute path and its path relative to the scan root.
 */
export interface PathEntry {
  readonly absPath: string;
  readonly relPath: string;
}

/** Relative path → summary text, in candidate order. */
export type SummaryMap = Map<string, string>;

export interface DigestEntry {
  fileName: string;
  summary: string;
}

export interface DigestSection {
  /** Directory relative to the scan root, or {@link ROOT_DIRECTORY} for the root itself */
  directory: string;
  entries: DigestEntry[];
}

export type DigestReport = DigestSection[];

export const ROOT_DIRECTORY = '/';
