import type { SummaryRequest } from './summarizer';

export const SUMMARY_TEMPERATURE = 0.3;
export const SUMMARY_MAX_TOKENS = 250;

export const SUMMARY_SYSTEM_PROMPT =
  'You are a helpful assistant that provides concise, technically accurate code summaries for LLM context.';

export type PromptMessage = { role: 'system'; content: string } | { role: 'user'; content: string };

export function buildSummaryPrompt(
  req: Pick<SummaryRequest, 'content' | 'filePath' | 'project'>,
): string {
  return `Analyze this file from the '${req.project}' project. These summaries will be used as context for an LLM to understand the codebase.

File path: ${req.filePath}

For your summary:
1. Explain the primary purpose of this file
2. Mention key functionality or components it implements
3. Note any important dependencies or relationships to other files (if apparent)
4. Focus on what would be most helpful for understanding the code's role in the project

Content:
${req.content}

Provide a concise, informative summary in 1-3 sentences.`;
}

export function buildSummaryMessages(req: SummaryRequest): PromptMessage[] {
  return [
    { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
    { role: 'user', content: buildSummaryPrompt(req) },
  ];
}
