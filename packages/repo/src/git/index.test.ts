import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import { spawn } from 'child_process';
import { ConfigError } from '@dirdigest/shared';
import { GitService } from './index';
import { GitIgnoreOracle, NullIgnoreOracle } from './ignore-oracle';

vi.mock('child_process', () => ({
  spawn: vi.fn(),
}));

interface FakeOutcome {
  code?: number;
  stdout?: string;
  error?: NodeJS.ErrnoException;
}

class FakeChild extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
}

/**
 * Answers each spawned git process from `respond(args)`, emitting output and
 * the exit event on the next tick like a real child process.
 */
function fakeGit(respond: (args: string[]) => FakeOutcome) {
  vi.mocked(spawn).mockImplementation(((_cmd: string, args: string[]) => {
    const child = new FakeChild();
    const outcome = respond(args);
    setImmediate(() => {
      if (outcome.error) {
        child.emit('error', outcome.error);
        return;
      }
      if (outcome.stdout) {
        child.stdout.emit('data', Buffer.from(outcome.stdout));
      }
      child.emit('close', outcome.code ?? 0);
    });
    return child;
  }) as unknown as typeof spawn);
}

function enoent(): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error('spawn git ENOENT');
  error.code = 'ENOENT';
  return error;
}

describe('GitService', () => {
  beforeEach(() => {
    vi.mocked(spawn).mockReset();
  });

  it('runs git against the repo root with -C', async () => {
    fakeGit(() => ({ code: 0, stdout: 'true\n' }));
    const git = new GitService({ repoRoot: '/work/project' });

    await expect(git.isInsideWorkTree()).resolves.toBe(true);
    expect(spawn).toHaveBeenCalledWith('git', [
      '-C',
      '/work/project',
      'rev-parse',
      '--is-inside-work-tree',
    ]);
  });

  it('reports a directory outside any work tree', async () => {
    fakeGit(() => ({ code: 128 }));
    const git = new GitService({ repoRoot: '/tmp/plain' });
    await expect(git.isInsideWorkTree()).resolves.toBe(false);
  });

  it('maps check-ignore exit codes to ignored / not ignored', async () => {
    const git = new GitService({ repoRoot: '/work/project' });

    fakeGit(() => ({ code: 0 }));
    await expect(git.isIgnored('build')).resolves.toBe(true);

    fakeGit(() => ({ code: 1 }));
    await expect(git.isIgnored('src')).resolves.toBe(false);

    fakeGit(() => ({ code: 128 }));
    await expect(git.isIgnored('src')).resolves.toBe(false);

    expect(spawn).toHaveBeenLastCalledWith('git', [
      '-C',
      '/work/project',
      'check-ignore',
      '--quiet',
      '--',
      'src',
    ]);
  });

  it('turns a missing git binary into a ConfigError', async () => {
    fakeGit(() => ({ error: enoent() }));
    const git = new GitService({ repoRoot: '/work/project' });

    const probe = git.isInsideWorkTree();
    await expect(probe).rejects.toBeInstanceOf(ConfigError);
    await expect(probe).rejects.toThrow('Git is not installed.');
  });
});

describe('GitIgnoreOracle', () => {
  beforeEach(() => {
    vi.mocked(spawn).mockReset();
  });

  it('asks git about the path relative to the root', async () => {
    fakeGit((args) => {
      if (args.includes('rev-parse')) return { code: 0, stdout: 'true' };
      return { code: args[args.length - 1] === 'build' ? 0 : 1 };
    });
    const oracle = new GitIgnoreOracle();

    await expect(oracle.isExcluded('/work/project', '/work/project/build')).resolves.toBe(true);
    await expect(oracle.isExcluded('/work/project', '/work/project/src/a.ts')).resolves.toBe(
      false,
    );
    expect(spawn).toHaveBeenLastCalledWith('git', [
      '-C',
      '/work/project',
      'check-ignore',
      '--quiet',
      '--',
      'src/a.ts',
    ]);
  });

  it('probes the work tree once per root', async () => {
    fakeGit((args) => (args.includes('rev-parse') ? { code: 0, stdout: 'true' } : { code: 1 }));
    const oracle = new GitIgnoreOracle();

    await oracle.isExcluded('/work/project', '/work/project/a.txt');
    await oracle.isExcluded('/work/project', '/work/project/b.txt');

    const probes = vi
      .mocked(spawn)
      .mock.calls.filter(([, args]) => Array.isArray(args) && args.includes('rev-parse'));
    expect(probes).toHaveLength(1);
    expect(spawn).toHaveBeenCalledTimes(3);
  });

  it('excludes nothing outside a work tree', async () => {
    fakeGit((args) => (args.includes('rev-parse') ? { code: 128 } : { code: 0 }));
    const oracle = new GitIgnoreOracle();

    await expect(oracle.isExcluded('/tmp/plain', '/tmp/plain/build')).resolves.toBe(false);
    expect(spawn).toHaveBeenCalledTimes(1);
  });

  it('never excludes the root itself or paths outside it', async () => {
    const oracle = new GitIgnoreOracle();

    await expect(oracle.isExcluded('/work/project', '/work/project')).resolves.toBe(false);
    await expect(oracle.isExcluded('/work/project', '/work/other/file.txt')).resolves.toBe(false);
    expect(spawn).not.toHaveBeenCalled();
  });

  it('propagates a missing git binary as fatal', async () => {
    fakeGit(() => ({ error: enoent() }));
    const oracle = new GitIgnoreOracle();

    await expect(oracle.isExcluded('/work/project', '/work/project/a.txt')).rejects.toBeInstanceOf(
      ConfigError,
    );
  });
});

describe('NullIgnoreOracle', () => {
  it('excludes nothing', async () => {
    await expect(new NullIgnoreOracle().isExcluded()).resolves.toBe(false);
  });
});
