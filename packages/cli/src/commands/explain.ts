import { Command } from 'commander';
import { CommandExplainer } from '@termwise/core';
import { colorsFor, OutputRenderer } from '../output/renderer';
import {
  createAdapterContext,
  createLogger,
  createProvider,
  loadConfig,
  withInterrupt,
} from '../context';

export function registerExplainCommand(program: Command, env: NodeJS.ProcessEnv = process.env) {
  program
    .command('explain')
    .alias('exp')
    .description('Explain what a shell command does')
    .argument('<command...>', 'The command to explain')
    // flags of the explained command belong to it
    .allowUnknownOption()
    .addHelpText(
      'after',
      `
Examples:
  $ termwise explain ls -la
  $ termwise exp "ps aux | grep node"
  $ termwise explain -- tar -h`,
    )
    .action(async (commandParts: string[], _options, command: Command) => {
      const config = loadConfig(command, env);
      const logger = createLogger(config);
      const renderer = new OutputRenderer(false, colorsFor(env));
      const target = commandParts.join(' ');

      await logger.info(`└─ Explaining: '${target}'`);

      const provider = await createProvider(config, logger);
      const explanation = await withInterrupt((signal) =>
        new CommandExplainer(provider, createAdapterContext(config, logger, signal)).explain(target),
      );
      renderer.text(explanation);
    });
}
