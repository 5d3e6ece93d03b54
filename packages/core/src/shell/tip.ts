import path from 'path';
import { isSupportedShell, SupportedShell } from './init';

const RC_FILES: Record<SupportedShell, string> = {
  zsh: '~/.zshrc',
  bash: '~/.bashrc',
  fish: '~/.config/fish/config.fish',
};

const SUPPRESS_COMMANDS: Record<SupportedShell, string> = {
  zsh: 'export TERMWISE_SUPPRESS_INTEGRATION_TIP=1',
  bash: 'export TERMWISE_SUPPRESS_INTEGRATION_TIP=1',
  fish: 'set -Ux TERMWISE_SUPPRESS_INTEGRATION_TIP 1',
};

/**
 * The enable-integration hint for interactive zsh, bash and fish users, or
 * `undefined` when integration is already active, the tip is suppressed, or no
 * supported shell is detected.
 */
export function integrationTip(env: NodeJS.ProcessEnv = process.env): string | undefined {
  if (env.TERMWISE_SHELL_INTEGRATION === '1') return undefined;
  if (env.TERMWISE_SUPPRESS_INTEGRATION_TIP === '1') return undefined;
  if (!env.SHELL) return undefined;

  const shell = path.basename(env.SHELL);
  if (!isSupportedShell(shell)) return undefined;

  const rcFile = RC_FILES[shell];
  return [
    'TIP: Enable shell integration to get commands straight into your prompt.',
    `   Run: termwise init ${shell} >> ${rcFile} && source ${rcFile}`,
    `   To hide this tip: ${SUPPRESS_COMMANDS[shell]}`,
  ].join('\n');
}
