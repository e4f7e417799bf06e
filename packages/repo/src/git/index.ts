import { spawn } from 'child_process';
import { ConfigError } from '@dirdigest/shared';

export interface GitServiceOptions {
  repoRoot: string;
}

export interface GitResult {
  code: number;
  stdout: string;
  stderr: string;
}

export class GitService {
  private repoRoot: string;

  constructor(options: GitServiceOptions) {
    this.repoRoot = options.repoRoot;
  }

  /**
   * Runs `git -C <repoRoot> ...args` and resolves with the exit code, whatever it is.
   * Rejects with a ConfigError only when git itself cannot be started.
   */
  run(args: string[]): Promise<GitResult> {
    return new Promise((resolve, reject) => {
      const child = spawn('git', ['-C', this.repoRoot, ...args]);
      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data) => {
        stderr += data.toString();
      });

      child.on('close', (code) => {
        resolve({ code: code ?? 1, stdout: stdout.trim(), stderr: stderr.trim() });
      });

      child.on('error', (err: NodeJS.ErrnoException) => {
        const reason = err.code === 'ENOENT' ? 'Git is not installed.' : 'Failed to start git.';
        reject(new ConfigError(`${reason} Install git or pass --ignore-gitignore.`, { cause: err }));
      });
    });
  }

  async isInsideWorkTree(): Promise<boolean> {
    const result = await this.run(['rev-parse', '--is-inside-work-tree']);
    return result.code === 0 && result.stdout === 'true';
  }

  /**
   * Exit code 0 from `check-ignore` means ignored; 1 means not ignored and
   * anything else is a git error, which is reported as not ignored.
   */
  async isIgnored(relativePath: string): Promise<boolean> {
    const result = await this.run(['check-ignore', '--quiet', '--', relativePath]);
    return result.code === 0;
  }
}
