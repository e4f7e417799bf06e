import { Command } from 'commander';
import { version } from '../package.json';
import { registerGenerateCommand } from './commands/generate';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('dirdigest')
    .description('Render a directory tree and, optionally, an LLM-ready digest of file summaries')
    .version(version)
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--yes', 'Automatically accept the default model')
    .option('--non-interactive', 'Disable interactive prompts (fail if prompt needed)');

  registerGenerateCommand(program);
  return program;
}
