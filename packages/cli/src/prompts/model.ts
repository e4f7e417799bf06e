import inquirer from 'inquirer';
import type { Logger } from '@dirdigest/shared';
import type { PromptOptions } from '../types';

export interface ModelPromptOptions extends PromptOptions {
  logger: Logger;
}

/**
 * Offers the default model and, if declined, asks for a custom one.
 * An empty answer falls back to the default.
 */
export async function chooseModel(
  defaultModel: string,
  options: ModelPromptOptions,
): Promise<string> {
  const { logger } = options;

  if (options.yes || options.nonInteractive || !process.stdin.isTTY) {
    logger.info(`Using default model: ${defaultModel}`);
    return defaultModel;
  }

  const { useDefault } = await inquirer.prompt<{ useDefault: boolean }>([
    {
      type: 'confirm',
      name: 'useDefault',
      message: `Would you like to use the default model (${defaultModel}) for all API calls?`,
      default: true,
    },
  ]);
  if (useDefault) {
    logger.info(`Using default model: ${defaultModel}`);
    return defaultModel;
  }

  const { customModel } = await inquirer.prompt<{ customModel: string }>([
    {
      type: 'input',
      name: 'customModel',
      message: 'Please enter the OpenAI model you would like to use:',
    },
  ]);
  const model = customModel.trim();
  if (model) {
    logger.info(`Using model: ${model} for all API calls`);
    return model;
  }

  logger.info(`No model specified, using default: ${defaultModel}`);
  return defaultModel;
}
