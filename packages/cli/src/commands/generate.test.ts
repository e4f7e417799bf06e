import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { ConfigError, UsageError, type Logger } from '@dirdigest/shared';
import { NullIgnoreOracle, type IgnoreOracle } from '@dirdigest/repo';
import type { SummaryRequest } from '@dirdigest/adapters';
import { runGenerate } from './generate';

vi.mock('inquirer', () => ({
  default: {
    prompt: vi.fn(),
  },
}));

class ListOracle implements IgnoreOracle {
  constructor(private readonly excluded: string[]) {}

  async isExcluded(root: string, target: string): Promise<boolean> {
    return this.excluded.includes(path.relative(root, target));
  }
}

function mockLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn<(bindings: Record<string, unknown>) => Logger>(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

describe('runGenerate', () => {
  let tmpDir: string;
  let root: string;
  let logger: ReturnType<typeof mockLogger>;

  const summarizer = {
    id: () => 'fake',
    summarize: vi.fn(async (req: SummaryRequest) => `Summary of ${req.filePath}.`),
  };

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dirdigest-cli-test-'));
    root = path.join(tmpDir, 'proj');
    await fs.mkdir(path.join(root, 'sub'), { recursive: true });
    await fs.writeFile(path.join(root, 'a.txt'), 'hello');
    await fs.writeFile(path.join(root, 'sub', 'c.md'), '# title');
    logger = mockLogger();
    summarizer.summarize.mockClear();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('writes only the tree without --llm-context', async () => {
    const createSummarizer = vi.fn(() => summarizer);

    const outcome = await runGenerate(
      { root: 'proj', outputDir: 'out', ignoreGitignore: true },
      { cwd: tmpDir, logger, createSummarizer },
    );

    const treePath = path.join(tmpDir, 'out', 'directory_tree.txt');
    expect(outcome).toEqual({ treePath });
    expect(await fs.readFile(treePath, 'utf8')).toBe(
      'proj/\n├── a.txt\n└── sub/\n    └── c.md\n',
    );
    expect(logger.info).toHaveBeenCalledWith(`Directory tree saved to: ${treePath}`);
    expect(createSummarizer).not.toHaveBeenCalled();
  });

  it('writes the digest grouped by directory', async () => {
    const sleep = vi.fn(async () => {});

    const outcome = await runGenerate(
      { root: 'proj', llmContext: true, model: 'test-model', ignoreGitignore: true },
      {
        cwd: tmpDir,
        logger,
        env: { OPENAI_API_KEY: 'test-key' },
        createSummarizer: () => summarizer,
        sleep,
      },
    );

    const digestPath = path.join(tmpDir, 'llmcontext.txt');
    expect(outcome.digestPath).toBe(digestPath);
    expect(await fs.readFile(digestPath, 'utf8')).toBe(
      '# proj\n\n' +
        '## Root Directory\n\n- **a.txt**: Summary of a.txt.\n\n' +
        '## sub/\n\n- **c.md**: Summary of sub/c.md.\n\n',
    );
    expect(summarizer.summarize).toHaveBeenCalledWith({
      content: 'hello',
      filePath: 'a.txt',
      project: 'proj',
      model: 'test-model',
    });
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(5000);
    expect(logger.info).toHaveBeenCalledWith(`LLM context has been saved to: ${digestPath}`);
  });

  it('passes the resolved key and base URL to the summarizer factory', async () => {
    await fs.writeFile(
      path.join(tmpDir, '.dirdigest.yaml'),
      'provider:\n  apiKeyEnv: CUSTOM_KEY\n  baseUrl: http://localhost:1234/v1\n',
    );
    const createSummarizer = vi.fn(() => summarizer);

    await runGenerate(
      { root: 'proj', llmContext: true, yes: true, batchDelay: 0, ignoreGitignore: true },
      { cwd: tmpDir, logger, env: { CUSTOM_KEY: 'test-key' }, createSummarizer },
    );

    expect(createSummarizer).toHaveBeenCalledWith({
      apiKey: 'test-key',
      baseUrl: 'http://localhost:1234/v1',
    });
    expect(summarizer.summarize).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'gpt-3.5-turbo-16k' }),
    );
  });

  it('caps the number of summarized files', async () => {
    const outcome = await runGenerate(
      { root: 'proj', llmContext: true, model: 'm', maxFiles: 1, batchDelay: 0, ignoreGitignore: true },
      { cwd: tmpDir, logger, env: { OPENAI_API_KEY: 'test-key' }, createSummarizer: () => summarizer },
    );

    expect(summarizer.summarize).toHaveBeenCalledTimes(1);
    expect(outcome.context?.dropped).toHaveLength(1);
    expect(logger.info).toHaveBeenCalledWith('Limiting to 1 files for summaries');
  });

  it('applies the ignore oracle to the tree and the digest', async () => {
    const createOracle = vi.fn(() => new ListOracle(['sub']));

    const outcome = await runGenerate(
      { root: 'proj', llmContext: true, model: 'm', batchDelay: 0 },
      {
        cwd: tmpDir,
        logger,
        env: { OPENAI_API_KEY: 'test-key' },
        createOracle,
        createSummarizer: () => summarizer,
      },
    );

    expect(createOracle).toHaveBeenCalledWith(true);
    expect(await fs.readFile(outcome.treePath, 'utf8')).toBe('proj/\n└── a.txt\n');
    expect(summarizer.summarize).toHaveBeenCalledTimes(1);
  });

  it('tells the oracle factory when ignore rules are off', async () => {
    const createOracle = vi.fn(() => new NullIgnoreOracle());

    await runGenerate({ root: 'proj', ignoreGitignore: true }, { cwd: tmpDir, logger, createOracle });

    expect(createOracle).toHaveBeenCalledWith(false);
  });

  it('reports the file cap before asking for credentials', async () => {
    await expect(
      runGenerate(
        { root: 'proj', llmContext: true, maxFiles: 1, nonInteractive: true, ignoreGitignore: true },
        { cwd: tmpDir, logger, env: {}, createSummarizer: () => summarizer },
      ),
    ).rejects.toThrow('No API key found. Set the OPENAI_API_KEY environment variable.');
    expect(logger.info).toHaveBeenCalledWith('Limiting to 1 files for summaries');
  });

  it('rejects a missing root directory', async () => {
    await expect(
      runGenerate({ root: 'missing', ignoreGitignore: true }, { cwd: tmpDir, logger }),
    ).rejects.toBeInstanceOf(UsageError);
  });

  it('fails without an API key in non-interactive mode', async () => {
    await expect(
      runGenerate(
        { root: 'proj', llmContext: true, nonInteractive: true, ignoreGitignore: true },
        { cwd: tmpDir, logger, env: {}, createSummarizer: () => summarizer },
      ),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(summarizer.summarize).not.toHaveBeenCalled();
  });
});
