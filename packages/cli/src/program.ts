import fs from 'fs';
import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { registerCheckCommand } from './commands/check';
import { registerExplainCommand } from './commands/explain';
import { registerGenerateCommand } from './commands/generate';
import { registerInitCommand } from './commands/init';
import { registerRulesCommand } from './commands/rules';

export const name = '@termwise/cli';

function readVersion(): string {
  const raw: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'),
  );
  return typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string'
    ? raw.version
    : '0.0.0';
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Builds the CLI. Commander errors are thrown instead of exiting so the caller
 * picks the exit code.
 */
export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command();

  program
    .name('termwise')
    .description('Turn plain language into shell commands, and flag the risky ones')
    .version(readVersion())
    .exitOverride()
    .option('--config <path>', 'Path to a YAML configuration file')
    .option('--debug', 'Print debug information on stderr')
    .option('--provider <name>', 'Model provider: gemini, openai or fake')
    .option('--model <name>', 'Model to use')
    .option('--api-key <key>', 'API key for the provider')
    .option('--mock-response <text>', 'Answer with this text instead of calling a model')
    .option('--mock-exit-code <code>', 'Force the verdict: 0 safe, 10 attention', parseInteger);

  registerGenerateCommand(program, env);
  registerExplainCommand(program, env);
  registerCheckCommand(program, env);
  registerInitCommand(program);
  registerRulesCommand(program, env);

  return program;
}
