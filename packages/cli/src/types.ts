export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
  yes?: boolean;
  nonInteractive?: boolean;
}

export interface GenerateFlags extends GlobalOptions {
  root?: string;
  llmContext?: boolean;
  maxFiles?: number;
  ignoreGitignore?: boolean;
  batchDelay?: number;
  model?: string;
  outputDir?: string;
  textExtensions?: string;
}

export interface PromptOptions {
  yes?: boolean;
  nonInteractive?: boolean;
}
