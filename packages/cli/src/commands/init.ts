import { Command } from 'commander';
import { renderInitScript, SUPPORTED_SHELLS } from '@termwise/core';
import { OutputRenderer } from '../output/renderer';

export function registerInitCommand(program: Command) {
  program
    .command('init')
    .description('Print the shell integration script')
    .argument('<shell>', `One of: ${SUPPORTED_SHELLS.join(', ')}`)
    .option('--function <name>', 'Name of the shell function to define', 'tw')
    .addHelpText(
      'after',
      `
Examples:
  $ termwise init zsh >> ~/.zshrc && source ~/.zshrc
  $ termwise init bash >> ~/.bashrc
  $ termwise init fish >> ~/.config/fish/config.fish`,
    )
    .action((shell: string, options: { function: string }) => {
      new OutputRenderer(false).text(renderInitScript(shell, { functionName: options.function }));
    });
}
