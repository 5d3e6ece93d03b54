import { Command } from 'commander';
import { createClassifier, integrationTip, runGeneration } from '@termwise/core';
import { colorsFor, OutputRenderer } from '../output/renderer';
import {
  createAdapterContext,
  createLogger,
  createProvider,
  loadConfig,
  withInterrupt,
} from '../context';

export function registerGenerateCommand(program: Command, env: NodeJS.ProcessEnv = process.env) {
  program
    .command('generate')
    .alias('gen')
    .description('Generate a shell command from a plain-language request')
    .argument('<query...>', 'What you want to do, e.g. "list all files"')
    .addHelpText(
      'after',
      `
Examples:
  $ termwise gen list all files
  $ termwise gen "init git repo"
  $ termwise gen -- find files larger than 100MB

The command is printed on stdout. Exit code 0 means it looks safe, 10 means it
needs your attention before running.`,
    )
    .action(async (queryParts: string[], _options, command: Command) => {
      const config = loadConfig(command, env);
      const logger = createLogger(config);
      const renderer = new OutputRenderer(false, colorsFor(env));
      const query = queryParts.join(' ');

      await logger.info(`└─ Generating command for: '${query}'`);

      const provider = await createProvider(config, logger);
      const result = await withInterrupt((signal) =>
        runGeneration(query, {
          provider,
          classifier: createClassifier(config.rules),
          ctx: createAdapterContext(config, logger, signal),
          forcedExitCode: config.mock.exitCode,
        }),
      );

      renderer.command(result.command);

      await logger.debug(`Generated command: ${result.command}`);
      await logger.debug(
        `Safety analysis: ${result.verdict.level} (reason: ${result.verdict.reason}, source: ${result.verdict.source})`,
      );
      if (result.reasoning) {
        await logger.debug(`Model explanation: ${result.reasoning}`);
      }

      const tip = integrationTip(env);
      if (tip) {
        renderer.notice(tip);
      }

      process.exitCode = result.exitCode;
    });
}
