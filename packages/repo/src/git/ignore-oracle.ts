import path from 'node:path';
import { GitService } from './index';

/**
 * Decides whether a path under a scan root is excluded by version-control rules.
 */
export interface IgnoreOracle {
  isExcluded(root: string, target: string): Promise<boolean>;
}

/** Excludes nothing. Used when ignore rules are switched off. */
export class NullIgnoreOracle implements IgnoreOracle {
  async isExcluded(): Promise<boolean> {
    return false;
  }
}

export type GitServiceFactory = (repoRoot: string) => GitService;

/**
 * Delegates to `git check-ignore`. Outside a git work tree nothing is excluded.
 * The work-tree probe is remembered per root for the lifetime of the instance,
 * so create one oracle per scan.
 */
export class GitIgnoreOracle implements IgnoreOracle {
  private readonly workTrees = new Map<string, Promise<boolean>>();
  private readonly services = new Map<string, GitService>();

  constructor(
    private readonly createService: GitServiceFactory = (repoRoot) => new GitService({ repoRoot }),
  ) {}

  async isExcluded(root: string, target: string): Promise<boolean> {
    const rootPath = path.resolve(root);
    const relativePath = path.relative(rootPath, path.resolve(target));
    if (
      !relativePath ||
      relativePath === '..' ||
      relativePath.startsWith(`..${path.sep}`) ||
      path.isAbsolute(relativePath)
    ) {
      return false;
    }

    const git = this.serviceFor(rootPath);
    if (!(await this.isWorkTree(rootPath, git))) {
      return false;
    }
    return git.isIgnored(relativePath);
  }

  private serviceFor(rootPath: string): GitService {
    let service = this.services.get(rootPath);
    if (!service) {
      service = this.createService(rootPath);
      this.services.set(rootPath, service);
    }
    return service;
  }

  private isWorkTree(rootPath: string, git: GitService): Promise<boolean> {
    let probe = this.workTrees.get(rootPath);
    if (!probe) {
      probe = git.isInsideWorkTree();
      this.workTrees.set(rootPath, probe);
    }
    return probe;
  }
}
