import OpenAI, { APIError, APIConnectionTimeoutError } from 'openai';
import {
  AppError,
  ConfigError,
  ProviderError,
  RateLimitError,
  TimeoutError,
  errorMessage,
} from '@dirdigest/shared';
import type { Summarizer, SummaryRequest } from '../summarizer';
import { buildSummaryMessages, SUMMARY_MAX_TOKENS, SUMMARY_TEMPERATURE } from '../prompt';

export interface OpenAISummarizerOptions {
  apiKey: string;
  baseUrl?: string;
}

/**
 * Summarizes files through the chat completions endpoint, one request per file.
 */
export class OpenAISummarizer implements Summarizer {
  private client: OpenAI;

  constructor(options: OpenAISummarizerOptions) {
    if (!options.apiKey) {
      throw new ConfigError('Missing API key for the OpenAI summarizer.');
    }
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      // failed files are skipped, never retried
      maxRetries: 0,
    });
  }

  id(): string {
    return 'openai';
  }

  async summarize(req: SummaryRequest): Promise<string | undefined> {
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: req.model,
        messages: buildSummaryMessages(req),
        temperature: SUMMARY_TEMPERATURE,
        max_tokens: SUMMARY_MAX_TOKENS,
      });
      content = completion.choices?.[0]?.message?.content;
    } catch (error) {
      throw this.mapError(error, req.filePath);
    }

    if (typeof content !== 'string') {
      throw new ProviderError(`Response for ${req.filePath} has no message content`);
    }
    const summary = content.trim();
    return summary || undefined;
  }

  private mapError(error: unknown, filePath: string): AppError {
    if (error instanceof APIError) {
      if (error.status === 429) {
        return new RateLimitError(error.message, { cause: error });
      }
      if (error.status === 401) {
        return new ConfigError(error.message, { cause: error });
      }
    }
    if (error instanceof APIConnectionTimeoutError) {
      return new TimeoutError(error.message, { cause: error });
    }
    return new ProviderError(`Summary request for ${filePath} failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}
