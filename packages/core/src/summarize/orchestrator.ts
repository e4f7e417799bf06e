import fs from 'node:fs/promises';
import {
  errorMessage,
  type Logger,
  type PathEntry,
  type SummaryMap,
} from '@dirdigest/shared';
import type { Summarizer } from '@dirdigest/adapters';

export type Sleep = (ms: number) => Promise<void>;
export type ReadFile = (absPath: string) => Promise<Buffer>;

export interface SummarizationOrchestratorOptions {
  summarizer: Summarizer;
  logger: Logger;
  /** Fixed pause after every remote attempt */
  delayMs: number;
  sleep?: Sleep;
  readFile?: ReadFile;
}

export interface SummarizationRunOptions {
  model: string;
  /** Project label embedded in each prompt */
  project: string;
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Keeps the first `maxFiles` candidates in walk order and reports how many were dropped.
 */
export function capCandidates(
  candidates: PathEntry[],
  maxFiles: number,
  logger: Logger,
): { kept: PathEntry[]; dropped: PathEntry[] } {
  if (candidates.length <= maxFiles) {
    return { kept: candidates, dropped: [] };
  }
  logger.info(`Limiting to ${maxFiles} files for summaries`);
  return { kept: candidates.slice(0, maxFiles), dropped: candidates.slice(maxFiles) };
}

/**
 * Summarizes candidates one at a time. A file that cannot be read, or whose
 * request fails or comes back empty, is logged and left out; the batch goes on.
 */
export class SummarizationOrchestrator {
  private readonly summarizer: Summarizer;
  private readonly logger: Logger;
  private readonly delayMs: number;
  private readonly sleep: Sleep;
  private readonly readFile: ReadFile;

  constructor(options: SummarizationOrchestratorOptions) {
    this.summarizer = options.summarizer;
    this.logger = options.logger;
    this.delayMs = options.delayMs;
    this.sleep = options.sleep ?? defaultSleep;
    this.readFile = options.readFile ?? ((absPath) => fs.readFile(absPath));
  }

  async run(candidates: PathEntry[], options: SummarizationRunOptions): Promise<SummaryMap> {
    const summaries: SummaryMap = new Map();

    for (const [index, candidate] of candidates.entries()) {
      const log = this.logger.child({ file: candidate.relPath });

      let content: string;
      try {
        content = await this.readText(candidate.absPath);
      } catch (error) {
        log.warn(`Error processing ${candidate.absPath}: ${errorMessage(error)}`);
        continue;
      }

      log.debug(`Summarizing (${index + 1}/${candidates.length}) with ${options.model}`);
      try {
        const summary = (
          await this.summarizer.summarize({
            content,
            filePath: candidate.relPath,
            project: options.project,
            model: options.model,
          })
        )?.trim();
        if (summary) {
          summaries.set(candidate.relPath, summary);
        } else {
          log.warn('Summarizer returned no content');
        }
      } catch (error) {
        log.error(error instanceof Error ? error : new Error(String(error)), 'Summary failed');
      }

      if (index < candidates.length - 1 && this.delayMs > 0) {
        await this.sleep(this.delayMs);
      }
    }

    return summaries;
  }

  private async readText(absPath: string): Promise<string> {
    return new TextDecoder('utf-8', { fatal: true }).decode(await this.readFile(absPath));
  }
}
