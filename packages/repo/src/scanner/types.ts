import type { Logger } from '@dirdigest/shared';
import type { IgnoreOracle } from '../git/ignore-oracle';

export interface WalkOptions {
  /** Consult the ignore oracle for every subdirectory and file */
  respectIgnore?: boolean;
}

export interface TreeWalkerDeps {
  oracle: IgnoreOracle;
  logger?: Logger;
}

/** Version-control metadata directory, never walked. */
export const VCS_METADATA_DIR = '.git';
