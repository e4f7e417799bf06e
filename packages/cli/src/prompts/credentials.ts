import inquirer from 'inquirer';
import { ConfigError } from '@dirdigest/shared';
import type { PromptOptions } from '../types';

export interface ApiKeyOptions extends PromptOptions {
  env?: NodeJS.ProcessEnv;
}

/**
 * Reads the API key from `envName`, or asks for it with a masked prompt.
 */
export async function resolveApiKey(
  envName: string,
  options: ApiKeyOptions = {},
): Promise<string> {
  const env = options.env ?? process.env;
  const fromEnv = env[envName]?.trim();
  if (fromEnv) {
    return fromEnv;
  }

  if (options.nonInteractive || !process.stdin.isTTY) {
    throw new ConfigError(`No API key found. Set the ${envName} environment variable.`);
  }

  const { apiKey } = await inquirer.prompt<{ apiKey: string }>([
    {
      type: 'password',
      name: 'apiKey',
      message: 'Enter your OpenAI API key:',
      mask: '*',
    },
  ]);

  const key = apiKey.trim();
  if (!key) {
    throw new ConfigError('No API key provided.');
  }
  return key;
}
