export const name = '@dirdigest/adapters';

export * from './summarizer';
export * from './prompt';
export * from './openai/adapter';
