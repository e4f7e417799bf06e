/**
 * One file to summarize. `filePath` is relative to the scan root and `project`
 * is the label the prompt uses for the codebase.
 */
export interface SummaryRequest {
  content: string;
  filePath: string;
  project: string;
  model: string;
}

/**
 * A remote (or fake) summarization service.
 *
 * Implementations resolve with the summary text, or `undefined` when the service
 * answered without content, and reject with an `AppError` subclass on failure.
 * They must not retry; pacing and failure tolerance belong to the caller.
 */
export interface Summarizer {
  id(): string;
  summarize(req: SummaryRequest): Promise<string | undefined>;
}
