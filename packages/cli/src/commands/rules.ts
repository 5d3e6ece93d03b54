import { Command } from 'commander';
import { createClassifier } from '@termwise/core';
import { colorsFor, OutputRenderer } from '../output/renderer';
import { loadConfig } from '../context';

export function registerRulesCommand(program: Command, env: NodeJS.ProcessEnv = process.env) {
  program
    .command('rules')
    .description('List the effective classification rules, built-in first')
    .option('--json', 'Print the rules as JSON')
    .action((options: { json?: boolean }, command: Command) => {
      const config = loadConfig(command, env);
      const table = createClassifier(config.rules).ruleTable();
      new OutputRenderer(options.json === true, colorsFor(env)).rules(table);
    });
}
