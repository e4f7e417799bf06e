import fs from 'node:fs/promises';
import path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import {
  ConsoleLogger,
  UsageError,
  atomicWrite,
  type DirdigestConfig,
  type Logger,
} from '@dirdigest/shared';
import {
  GitIgnoreOracle,
  NullIgnoreOracle,
  TextClassifier,
  loadTextExtensions,
  renderTree,
  type IgnoreOracle,
} from '@dirdigest/repo';
import {
  OpenAISummarizer,
  type OpenAISummarizerOptions,
  type Summarizer,
} from '@dirdigest/adapters';
import {
  ConfigLoader,
  projectNameFor,
  renderDigest,
  selectCandidates,
  summarizeSelection,
  type ContextResult,
  type Sleep,
} from '@dirdigest/core';
import { resolveApiKey } from '../prompts/credentials';
import { chooseModel } from '../prompts/model';
import type { GenerateFlags } from '../types';

export interface GenerateDeps {
  logger?: Logger;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  createOracle?: (respectIgnore: boolean) => IgnoreOracle;
  createSummarizer?: (options: OpenAISummarizerOptions) => Summarizer;
  sleep?: Sleep;
}

export interface GenerateOutcome {
  treePath: string;
  digestPath?: string;
  context?: ContextResult;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of seconds.');
  }
  return parsed;
}

function toConfigFlags(flags: GenerateFlags) {
  return {
    root: flags.root,
    llmContext: flags.llmContext,
    maxFiles: flags.maxFiles,
    respectGitignore: flags.ignoreGitignore ? false : undefined,
    batchDelaySeconds: flags.batchDelay,
    model: flags.model,
    outputDir: flags.outputDir,
    textExtensionsFile: flags.textExtensions,
  };
}

async function assertDirectory(root: string): Promise<void> {
  let isDir = false;
  try {
    isDir = (await fs.stat(root)).isDirectory();
  } catch {
    isDir = false;
  }
  if (!isDir) {
    throw new UsageError(`Root directory does not exist or is not a directory: ${root}`);
  }
}

/**
 * Writes the tree artifact and, when requested, the summary digest.
 */
export async function runGenerate(
  flags: GenerateFlags,
  deps: GenerateDeps = {},
): Promise<GenerateOutcome> {
  const cwd = deps.cwd ?? process.cwd();
  const logger = deps.logger ?? new ConsoleLogger({ verbose: flags.verbose });
  const config: DirdigestConfig = ConfigLoader.load({
    configPath: flags.config,
    flags: toConfigFlags(flags),
    cwd,
  });

  const root = path.resolve(cwd, config.root);
  await assertDirectory(root);
  const project = projectNameFor(root);
  const respectIgnore = config.respectGitignore;
  const oracle = deps.createOracle
    ? deps.createOracle(respectIgnore)
    : respectIgnore
      ? new GitIgnoreOracle()
      : new NullIgnoreOracle();

  const treePath = path.resolve(cwd, config.outputDir, config.treeFile);
  const tree = await renderTree(root, { name: project, respectIgnore, oracle });
  await atomicWrite(treePath, tree);
  logger.info(`Directory tree saved to: ${treePath}`);

  if (!config.llmContext) {
    return { treePath };
  }

  const textExtensions = await loadTextExtensions(
    config.textExtensionsFile ? path.resolve(cwd, config.textExtensionsFile) : undefined,
  );
  // The cap notice comes before any prompt
  const selection = await selectCandidates(root, {
    maxFiles: config.maxFiles,
    respectIgnore,
    oracle,
    classifier: new TextClassifier({ textExtensions }),
    logger,
  });

  const apiKey = await resolveApiKey(config.provider.apiKeyEnv, {
    env: deps.env,
    nonInteractive: flags.nonInteractive,
  });
  const model =
    config.model ??
    (await chooseModel(config.defaultModel, {
      yes: flags.yes,
      nonInteractive: flags.nonInteractive,
      logger,
    }));
  const summarizerOptions = { apiKey, baseUrl: config.provider.baseUrl };
  const summarizer = deps.createSummarizer
    ? deps.createSummarizer(summarizerOptions)
    : new OpenAISummarizer(summarizerOptions);

  const context = await summarizeSelection(selection, {
    project,
    model,
    delayMs: Math.round(config.batchDelaySeconds * 1000),
    summarizer,
    sleep: deps.sleep,
    logger,
  });

  const digestPath = path.resolve(cwd, config.outputDir, config.digestFile);
  await atomicWrite(digestPath, renderDigest(project, context.report));
  logger.info(
    `Summarized ${context.summaries.size} of ${context.candidates.length - context.dropped.length} files`,
  );
  logger.info(`LLM context has been saved to: ${digestPath}`);

  return { treePath, digestPath, context };
}

export function registerGenerateCommand(program: Command) {
  program
    .option('--root <dir>', 'Root directory to start from (default current directory)')
    .option('--llm-context', 'Create short summary of each file suitable for LLM context')
    .option(
      '--max-files <n>',
      'Maximum number of files allowed to generate summary for (default 100)',
      parsePositiveInt,
    )
    .option('--ignore-gitignore', 'Ignore .gitignore patterns')
    .option(
      '--batch-delay <seconds>',
      'Delay between each LLM API call for the file summary generations (default 5.0)',
      parseSeconds,
    )
    .option('--model <id>', 'Model to use for all API calls (skips the model prompt)')
    .option('--output-dir <dir>', 'Directory the artifacts are written to')
    .option('--text-extensions <file>', 'JSON array of file extensions always treated as text')
    .action(async (options: GenerateFlags) => {
      await runGenerate(options);
    });
}
