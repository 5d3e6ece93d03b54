import { Command } from 'commander';
import { createClassifier } from '@termwise/core';
import { toExitCode } from '@termwise/safety';
import { colorsFor, OutputRenderer } from '../output/renderer';
import { createLogger, loadConfig } from '../context';

export function registerCheckCommand(program: Command, env: NodeJS.ProcessEnv = process.env) {
  program
    .command('check')
    .description('Classify a command with the local rules, without calling a model')
    .argument('<command...>', 'The command to classify')
    .option('--json', 'Print the verdict as JSON')
    .allowUnknownOption()
    .action(async (commandParts: string[], options: { json?: boolean }, command: Command) => {
      const config = loadConfig(command, env);
      const logger = createLogger(config);
      const target = commandParts.join(' ');

      const result = createClassifier(config.rules).classify(target);
      await logger.debug(`Safety analysis: ${result.level} (reason: ${result.reason}, source: ${result.source})`);

      new OutputRenderer(options.json === true, colorsFor(env)).verdict(target, result);
      process.exitCode = toExitCode(result.level);
    });
}
