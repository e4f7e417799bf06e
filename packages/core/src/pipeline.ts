import path from 'node:path';
import type { DigestReport, Logger, PathEntry, SummaryMap } from '@dirdigest/shared';
import { TreeWalker, type IgnoreOracle, type TextClassifier } from '@dirdigest/repo';
import type { Summarizer } from '@dirdigest/adapters';
import { SummarizationOrchestrator, capCandidates, type Sleep } from './summarize/orchestrator';
import { groupSummaries } from './digest/aggregator';

export interface DiscoverOptions {
  respectIgnore: boolean;
  oracle: IgnoreOracle;
  classifier: TextClassifier;
  logger: Logger;
}

/** Walks `root` and keeps the files the classifier accepts as text. */
export async function discoverCandidates(
  root: string,
  options: DiscoverOptions,
): Promise<PathEntry[]> {
  const walker = new TreeWalker({ oracle: options.oracle, logger: options.logger });
  const candidates: PathEntry[] = [];
  for await (const entry of walker.walk(root, { respectIgnore: options.respectIgnore })) {
    if (await options.classifier.isText(entry.absPath)) {
      candidates.push(entry);
    } else {
      options.logger.debug(`Skipping non-text file ${entry.relPath}`);
    }
  }
  return candidates;
}

export interface SelectCandidatesOptions extends DiscoverOptions {
  maxFiles: number;
}

export interface CandidateSelection {
  candidates: PathEntry[];
  /** First `maxFiles` candidates in walk order */
  kept: PathEntry[];
  /** Candidates past the cap, never sent to the summarizer */
  dropped: PathEntry[];
}

/** Discovers text files under `root` and applies the file cap. */
export async function selectCandidates(
  root: string,
  options: SelectCandidatesOptions,
): Promise<CandidateSelection> {
  const candidates = await discoverCandidates(root, options);
  options.logger.debug(`Found ${candidates.length} text files`);
  const { kept, dropped } = capCandidates(candidates, options.maxFiles, options.logger);
  return { candidates, kept, dropped };
}

export interface SummarizeSelectionOptions {
  project: string;
  model: string;
  delayMs: number;
  summarizer: Summarizer;
  logger: Logger;
  sleep?: Sleep;
}

export interface ContextResult {
  candidates: PathEntry[];
  dropped: PathEntry[];
  summaries: SummaryMap;
  report: DigestReport;
}

export async function summarizeSelection(
  selection: CandidateSelection,
  options: SummarizeSelectionOptions,
): Promise<ContextResult> {
  const orchestrator = new SummarizationOrchestrator({
    summarizer: options.summarizer,
    logger: options.logger,
    delayMs: options.delayMs,
    sleep: options.sleep,
  });
  const summaries = await orchestrator.run(selection.kept, {
    model: options.model,
    project: options.project,
  });

  return {
    candidates: selection.candidates,
    dropped: selection.dropped,
    summaries,
    report: groupSummaries(summaries),
  };
}

export interface GenerateContextOptions extends SelectCandidatesOptions, SummarizeSelectionOptions {
  root: string;
}

export async function generateContext(options: GenerateContextOptions): Promise<ContextResult> {
  const selection = await selectCandidates(options.root, options);
  return summarizeSelection(selection, options);
}

/** Basename of the resolved root, or the root itself for a filesystem root. */
export function projectNameFor(root: string): string {
  const resolved = path.resolve(root);
  return path.basename(resolved) || resolved;
}
